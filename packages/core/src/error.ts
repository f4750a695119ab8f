export type ErrorData =
  // lexing
  | { kind: "InvalidToken"; text: string; offset: number }

  // parsing
  | { kind: "EmptyExpression" }
  | { kind: "UnknownFunction"; name: string; offset: number }
  | { kind: "UnmatchedParenthesis"; offset: number }
  // `text` is empty when the input ended early
  | { kind: "UnexpectedToken"; text: string; offset: number };

export type ErrorKind = ErrorData["kind"];

const describe = (data: ErrorData): string => {
  switch (data.kind) {
    case "InvalidToken":
      return `invalid token \`${data.text}\` at offset ${data.offset}`;
    case "EmptyExpression":
      return "empty expression";
    case "UnknownFunction":
      return `unknown function \`${data.name}\` at offset ${data.offset}`;
    case "UnmatchedParenthesis":
      return `unmatched \`(\` at offset ${data.offset}`;
    case "UnexpectedToken":
      return `unexpected ${data.text === "" ? "end of input" : `\`${data.text}\``} at offset ${data.offset}`;
  }
};

export class ParseError extends Error {
  data: ErrorData;

  constructor(data: ErrorData) {
    super(describe(data));
    this.name = "ParseError";
    this.data = data;
  }
}
