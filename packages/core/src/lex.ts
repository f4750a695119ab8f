import moo from "moo";
import type { Lexer } from "moo";
import { ParseError } from "./error.js";

export const lexer = (): Lexer =>
  moo.compile({
    space: { match: /\s+/, lineBreaks: true },
    num: /\d+(?:\.\d+)?\b/,
    id: /[A-Za-z_]\w*/,
    punct: ["+", "-", "*", "/", "^", "(", ")"],
    error: moo.error,
  });

const puncts = ["+", "-", "*", "/", "^", "(", ")"] as const;

export type Punct = (typeof puncts)[number];

const isPunct = (s: string): s is Punct =>
  (puncts as readonly string[]).includes(s);

export type Token = { text: string; offset: number } & (
  | { kind: "num"; val: number }
  | { kind: "param" }
  | { kind: "name"; val: string }
  | { kind: Punct }
);

/** Offending text at the start of what the lexer could not match. */
const culprit = (rest: string): string => rest.match(/^(?:[\w.]+|\S)/)?.[0] ?? rest;

/**
 * Splits `input` into tokens, dropping whitespace. Identifiers are lowercased;
 * the one equal to `param` becomes a `param` token.
 */
export const tokenize = (input: string, param = "t"): Token[] => {
  const lex = lexer();
  lex.reset(input);
  const tokens: Token[] = [];
  for (const { type, text, offset } of lex) {
    switch (type) {
      case "space":
        break;
      case "num":
        tokens.push({ kind: "num", val: Number(text), text, offset });
        break;
      case "id": {
        const val = text.toLowerCase();
        tokens.push(
          val === param
            ? { kind: "param", text, offset }
            : { kind: "name", val, text, offset },
        );
        break;
      }
      default:
        if (type === "punct" && isPunct(text))
          tokens.push({ kind: text, text, offset });
        else
          throw new ParseError({
            kind: "InvalidToken",
            text: culprit(text),
            offset,
          });
    }
  }
  return tokens;
};
