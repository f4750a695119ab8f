import type { BinaryOp, Term } from "./term.js";

/** Binding strength, matching the grammar levels in `parse.ts`. */
export enum Level {
  Sum,
  Product,
  Power,
  Unary,
  Atom,
}

const negative = (x: number): boolean => x < 0 || Object.is(x, -0);

const levels: Record<BinaryOp, Level> = {
  "+": Level.Sum,
  "-": Level.Sum,
  "*": Level.Product,
  "/": Level.Product,
  "^": Level.Power,
};

/** Loosest level each side of an operator may print at without parentheses. */
const operands: Record<BinaryOp, [Level, Level]> = {
  "+": [Level.Sum, Level.Product],
  "-": [Level.Sum, Level.Product],
  "*": [Level.Product, Level.Power],
  "/": [Level.Product, Level.Power],
  // `^` groups to the right and takes a unary on its left
  "^": [Level.Unary, Level.Power],
};

/**
 * Renders terms with only the parentheses the parser needs to read them back
 * as the same tree. Piecewise terms, non-finite constants and constants that
 * print in exponent form have no source syntax, so that output is display only.
 */
export class Printer {
  param: string;
  strings: string[];

  constructor(param = "t") {
    this.param = param;
    this.strings = [];
  }

  flush(): string {
    const s = this.strings.join("");
    this.strings = [];
    return s;
  }

  push(s: string) {
    this.strings.push(s);
  }

  /** Prints `e`, parenthesized if it binds looser than `min`. */
  term(e: Term, min: Level = Level.Sum) {
    const level = this.level(e);
    if (level < min) this.push("(");
    this.bare(e);
    if (level < min) this.push(")");
  }

  level(e: Term): Level {
    switch (e.kind) {
      case "const":
        return negative(e.val) ? Level.Unary : Level.Atom;
      case "param":
      case "piecewise":
        return Level.Atom;
      case "binary":
        return levels[e.op];
      case "unary":
        return e.name === "-" ? Level.Unary : Level.Atom;
    }
  }

  bare(e: Term) {
    switch (e.kind) {
      case "const":
        if (negative(e.val)) {
          this.push("-");
          this.push(`${-e.val}`);
        } else this.push(`${e.val}`);
        break;
      case "param":
        this.push(this.param);
        break;
      case "binary": {
        const [left, right] = operands[e.op];
        this.term(e.left, left);
        this.push(` ${e.op} `);
        this.term(e.right, right);
        break;
      }
      case "unary":
        if (e.name === "-") {
          this.push("-");
          this.term(e.arg, Level.Unary);
        } else {
          this.push(`${e.name}(`);
          this.term(e.arg);
          this.push(")");
        }
        break;
      case "piecewise":
        this.push("piecewise");
        if (e.cycle !== undefined) this.push(`[${e.cycle}]`);
        this.push("(");
        e.parts.forEach(({ after, term }, i) => {
          if (i > 0) this.push(", ");
          this.push(`${after}: `);
          this.term(term);
        });
        this.push(")");
        break;
    }
  }
}

export const print = (e: Term, param = "t"): string => {
  const printer = new Printer(param);
  printer.term(e);
  return printer.flush();
};
