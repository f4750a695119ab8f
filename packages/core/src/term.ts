export type BinaryOp = "+" | "-" | "*" | "/" | "^";

export type UnaryFn = (x: number) => number;

export interface Piece {
  /** smallest parameter value at which this piece applies */
  readonly after: number;
  readonly term: Term;
}

export type Term =
  | { readonly kind: "const"; readonly val: number }
  | { readonly kind: "param" }
  | {
      readonly kind: "binary";
      readonly op: BinaryOp;
      readonly left: Term;
      readonly right: Term;
    }
  | {
      readonly kind: "unary";
      readonly name: string;
      readonly f: UnaryFn;
      readonly arg: Term;
    }
  | {
      readonly kind: "piecewise";
      readonly parts: readonly Piece[];
      readonly cycle: number | undefined;
    };

/** A term, or a number to be wrapped as a constant. */
export type Operand = Term | number;

const term = (x: Operand): Term => (typeof x === "number" ? constant(x) : x);

export const constant = (val: number): Term => ({ kind: "const", val });

export const param: Term = { kind: "param" };

const binary =
  (op: BinaryOp) =>
  (left: Operand, right: Operand): Term => ({
    kind: "binary",
    op,
    left: term(left),
    right: term(right),
  });

export const add = binary("+");
export const sub = binary("-");
export const mul = binary("*");
export const div = binary("/");
export const pow = binary("^");

export const call = (name: string, f: UnaryFn, arg: Operand): Term => ({
  kind: "unary",
  name,
  f,
  arg: term(arg),
});

const negate: UnaryFn = (x) => -x;

/** Negation is a unary node named `-`, which no identifier can shadow. */
export const neg = (x: Operand): Term => call("-", negate, x);

/**
 * A function defined on intervals. Each piece applies from its `after` value
 * up to the next piece's; the first piece also covers everything below. With a
 * `cycle`, parameter values past it wrap around by remainder.
 */
export const piecewise = (
  parts: { after: number; term: Operand }[],
  cycle?: number,
): Term => ({
  kind: "piecewise",
  parts: [...parts]
    .sort((a, b) => a.after - b.after)
    .map(({ after, term: x }) => ({ after, term: term(x) })),
  cycle,
});

const apply = (op: BinaryOp, x: number, y: number): number => {
  switch (op) {
    case "+":
      return x + y;
    case "-":
      return x - y;
    case "*":
      return x * y;
    case "/":
      return x / y;
    case "^":
      return Math.pow(x, y);
  }
};

/**
 * Never throws for terms whose unary functions don't: undefined operations
 * come out as `NaN` or an infinity.
 */
export const evaluate = (e: Term, t: number): number => {
  switch (e.kind) {
    case "const":
      return e.val;
    case "param":
      return t;
    case "binary":
      return apply(e.op, evaluate(e.left, t), evaluate(e.right, t));
    case "unary":
      return e.f(evaluate(e.arg, t));
    case "piecewise": {
      const [first, ...rest] = e.parts;
      if (first === undefined) return 0;
      const x = e.cycle !== undefined && t > e.cycle ? t % e.cycle : t;
      let current = first.term;
      for (const { after, term } of rest) {
        if (x < after) break;
        current = term;
      }
      return evaluate(current, x);
    }
  }
};
