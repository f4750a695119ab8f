import { ParseError } from "./error.js";
import { defaultFunctions, functionTable } from "./functions.js";
import type { Punct, Token } from "./lex.js";
import {
  type Term,
  add,
  call,
  constant,
  div,
  mul,
  neg,
  param,
  pow,
  sub,
  type UnaryFn,
} from "./term.js";

export type FunctionTable = ReadonlyMap<string, UnaryFn>;

const defaultTable: FunctionTable = functionTable(defaultFunctions, "t");

/**
 * Recursive descent, loosest to tightest:
 *
 * ```
 * expr  := term (('+'|'-') term)*
 * term  := power (('*'|'/') power)*
 * power := unary ('^' power)?
 * unary := '-' unary | atom
 * atom  := num | param | name '(' expr ')' | '(' expr ')'
 * ```
 *
 * so `^` is right-associative and binds looser than prefix `-`.
 */
export class Parser {
  tokens: Token[];
  functions: FunctionTable;
  i: number;

  constructor(tokens: Token[], functions: FunctionTable) {
    this.tokens = tokens;
    this.functions = functions;
    this.i = 0;
  }

  peek(): Token | undefined {
    return this.tokens[this.i];
  }

  /** Consumes the next token if it is `kind`. */
  maybe(kind: Punct): Token | undefined {
    const tok = this.peek();
    if (tok === undefined || tok.kind !== kind) return undefined;
    ++this.i;
    return tok;
  }

  unexpected(tok: Token | undefined): ParseError {
    if (tok !== undefined)
      return new ParseError({
        kind: "UnexpectedToken",
        text: tok.text,
        offset: tok.offset,
      });
    const last = this.tokens[this.tokens.length - 1];
    const offset = last === undefined ? 0 : last.offset + last.text.length;
    return new ParseError({ kind: "UnexpectedToken", text: "", offset });
  }

  pop(): Token {
    const tok = this.peek();
    if (tok === undefined) throw this.unexpected(tok);
    ++this.i;
    return tok;
  }

  close() {
    if (this.maybe(")") === undefined) throw this.unexpected(this.peek());
  }

  parseAtom(): Term {
    const tok = this.pop();
    switch (tok.kind) {
      case "num":
        return constant(tok.val);
      case "param":
        return param;
      case "name": {
        const f = this.functions.get(tok.val);
        if (f === undefined)
          throw new ParseError({
            kind: "UnknownFunction",
            name: tok.val,
            offset: tok.offset,
          });
        if (this.maybe("(") === undefined) throw this.unexpected(this.peek());
        const arg = this.parseExpr();
        this.close();
        return call(tok.val, f, arg);
      }
      case "(": {
        const x = this.parseExpr();
        this.close();
        return x;
      }
      default:
        throw this.unexpected(tok);
    }
  }

  parseUnary(): Term {
    if (this.maybe("-") !== undefined) return neg(this.parseUnary());
    return this.parseAtom();
  }

  parsePower(): Term {
    const x = this.parseUnary();
    if (this.maybe("^") !== undefined) return pow(x, this.parsePower());
    return x;
  }

  parseTerm(): Term {
    let x = this.parsePower();
    while (true) {
      if (this.maybe("*") !== undefined) x = mul(x, this.parsePower());
      else if (this.maybe("/") !== undefined) x = div(x, this.parsePower());
      else return x;
    }
  }

  parseExpr(): Term {
    let x = this.parseTerm();
    while (true) {
      if (this.maybe("+") !== undefined) x = add(x, this.parseTerm());
      else if (this.maybe("-") !== undefined) x = sub(x, this.parseTerm());
      else return x;
    }
  }
}

/**
 * Throws if some `(` is never closed, naming the innermost one. A stray `)` is
 * left for the parser to report where it occurs.
 */
const balance = (tokens: Token[]) => {
  const open: Token[] = [];
  for (const tok of tokens) {
    if (tok.kind === "(") open.push(tok);
    else if (tok.kind === ")") open.pop();
  }
  const unclosed = open.pop();
  if (unclosed !== undefined)
    throw new ParseError({
      kind: "UnmatchedParenthesis",
      offset: unclosed.offset,
    });
};

/** Throws a `ParseError` rather than returning a partial tree. */
export const parse = (
  tokens: Token[],
  functions: FunctionTable = defaultTable,
): Term => {
  if (tokens.length === 0) throw new ParseError({ kind: "EmptyExpression" });
  balance(tokens);
  const parser = new Parser(tokens, functions);
  const term = parser.parseExpr();
  const extra = parser.peek();
  if (extra !== undefined) throw parser.unexpected(extra);
  return term;
};
