import { type Functions, defaultFunctions, functionTable, normalizeName } from "./functions.js";
import { tokenize } from "./lex.js";
import { parse } from "./parse.js";
import { print } from "./pprint.js";
import { type Term, evaluate } from "./term.js";

export { type ErrorData, type ErrorKind, ParseError } from "./error.js";
export { type Functions, defaultFunctions } from "./functions.js";
export { type Punct, type Token, tokenize } from "./lex.js";
export { type FunctionTable, Parser, parse } from "./parse.js";
export { Level, Printer, print } from "./pprint.js";
export {
  type BinaryOp,
  type Operand,
  type Piece,
  type Term,
  type UnaryFn,
  add,
  call,
  constant,
  div,
  evaluate,
  mul,
  neg,
  param,
  piecewise,
  pow,
  sub,
} from "./term.js";

export interface ParseOptions {
  /** Function table, replacing `defaultFunctions`; names are case-insensitive. */
  functions?: Functions;
  /** Name of the parameter; defaults to `t`. */
  param?: string;
}

/** A parametric function `t => number`, parsed once and evaluated any number of times. */
export class Parametrizer {
  readonly term: Term;
  readonly param: string;

  /** Wraps a term built by hand, skipping the string syntax entirely. */
  constructor(term: Term, param = "t") {
    this.term = term;
    this.param = param;
  }

  /**
   * Throws a `ParseError` for malformed input, or a plain `Error` if `options`
   * name an invalid function or parameter.
   */
  static parse(input: string, options: ParseOptions = {}): Parametrizer {
    const param = normalizeName(options.param ?? "t");
    const functions = functionTable(options.functions ?? defaultFunctions, param);
    return new Parametrizer(parse(tokenize(input, param), functions), param);
  }

  evaluate(t: number): number {
    return evaluate(this.term, t);
  }

  toString(): string {
    return print(this.term, this.param);
  }
}
