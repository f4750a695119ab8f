import { describe, expect, test } from "vitest";
import {
  type ErrorKind,
  ParseError,
  Parametrizer,
  add,
  defaultFunctions,
  mul,
  param,
} from "./index.js";

const value = (source: string, t: number): number =>
  Parametrizer.parse(source).evaluate(t);

const errorKind = (source: string): ErrorKind => {
  try {
    Parametrizer.parse(source);
  } catch (e) {
    if (e instanceof ParseError) return e.data.kind;
    throw e;
  }
  throw Error(`parsed without error: ${source}`);
};

describe("evaluate", () => {
  test("constants", () => {
    for (const c of ["0", "1.35", "42"]) {
      const f = Parametrizer.parse(c);
      for (const t of [-2, 0, 3.4]) expect(f.evaluate(t)).toBe(Number(c));
    }
  });

  test("parameter", () => {
    const f = Parametrizer.parse("t");
    for (const t of [-7.5, 0, 3, 1e300]) expect(f.evaluate(t)).toBe(t);
  });

  test("uppercase and spaces", () => {
    expect(value("6 + T", 2)).toBe(8);
  });

  test("arithmetic", () => {
    expect(value("15-3*t", 3)).toBe(6);
    expect(value("6/t", 3)).toBe(2);
    expect(value("-t", 9)).toBe(-9);
    expect(value("13+((2*t)+5)", 1)).toBe(20);
    expect(value("13+((2*t)+5)", 6)).toBe(30);
    expect(value("1+t", 0.16)).toBeCloseTo(1.16);
  });

  test("precedence", () => {
    expect(value("2+3*4", 0)).toBe(14);
    expect(value("(2+3)*4", 0)).toBe(20);
  });

  test("pow groups right", () => {
    expect(value("2^3^2", 0)).toBe(512);
  });

  test("negation binds tighter than pow", () => {
    expect(value("-2^2", 0)).toBe(4);
    expect(value("-(2^2)", 0)).toBe(-4);
  });

  test("functions", () => {
    expect(value("sin(t*t + t - 1)", 3)).toBe(Math.sin(11));
    expect(value("2*cos(t+5)", 1)).toBe(2 * Math.cos(6));
    expect(value("ln(exp(t))", 2)).toBe(Math.log(Math.exp(2)));
    expect(value("abs(t) + sqrt(t^2)", -3)).toBe(6);
  });

  test("division by zero is infinite", () => {
    expect(value("1/0", 0)).toBe(Infinity);
    expect(value("-1/t", 0)).toBe(-Infinity);
    expect(value("t/0", 0)).toBeNaN();
  });

  test("square root of a negative is NaN", () => {
    expect(value("sqrt(-1)", 0)).toBeNaN();
    expect(value("ln(t)", -1)).toBeNaN();
  });

  test("repeated evaluation is identical", () => {
    const f = Parametrizer.parse("sin(t)^2 + sqrt(t - 5)");
    for (const t of [0.1, 7, 12.25]) {
      const first = f.evaluate(t);
      for (let i = 0; i < 3; i++)
        expect(Object.is(f.evaluate(t), first)).toBe(true);
    }
  });
});

describe("built terms", () => {
  test("match parsed terms", () => {
    const built = new Parametrizer(add(1, mul(mul(2, param), param)));
    const parsed = Parametrizer.parse("1+2*t*t");
    expect(built.evaluate(3)).toBe(19);
    expect(parsed.evaluate(3)).toBe(19);
    expect(built.term).toEqual(parsed.term);
  });

  test("print", () => {
    expect(new Parametrizer(add(param, 1), "x").toString()).toBe("x + 1");
  });
});

describe("errors", () => {
  test("kinds", () => {
    expect(errorKind("")).toBe("EmptyExpression");
    expect(errorKind("(1+2")).toBe("UnmatchedParenthesis");
    expect(errorKind("(")).toBe("UnmatchedParenthesis");
    expect(errorKind("sin(")).toBe("UnmatchedParenthesis");
    expect(errorKind("1+")).toBe("UnexpectedToken");
    expect(errorKind("1 2")).toBe("UnexpectedToken");
    expect(errorKind("1+2)")).toBe("UnexpectedToken");
    expect(errorKind("foo(1)")).toBe("UnknownFunction");
    expect(errorKind("1 $ 2")).toBe("InvalidToken");
  });

  test("is an Error", () => {
    expect(() => Parametrizer.parse("(")).toThrow(ParseError);
  });
});

describe("options", () => {
  test("custom functions replace the defaults", () => {
    const f = Parametrizer.parse("Log( square(t) + 3 )", {
      functions: { LOG: Math.log, square: (x) => x * x },
    });
    expect(f.evaluate(2)).toBe(Math.log(7));
    expect(f.evaluate(5)).toBe(Math.log(28));
    expect(() =>
      Parametrizer.parse("sin(t)", { functions: { square: (x) => x * x } }),
    ).toThrow("unknown function `sin` at offset 0");
  });

  test("extending the defaults", () => {
    const f = Parametrizer.parse("cube(sin(t))", {
      functions: { ...defaultFunctions, cube: (x) => x * x * x },
    });
    const x = Math.sin(1);
    expect(f.evaluate(1)).toBe(x * x * x);
  });

  test("parameter name", () => {
    const f = Parametrizer.parse("X^2", { param: "x" });
    expect(f.evaluate(3)).toBe(9);
    expect(f.toString()).toBe("x ^ 2");
    expect(() => Parametrizer.parse("t", { param: "x" })).toThrow(
      "unknown function `t` at offset 0",
    );
  });

  test("invalid function name", () => {
    expect(() =>
      Parametrizer.parse("t", { functions: { "2x": Math.abs } }),
    ).toThrow("invalid identifier: 2x");
  });

  test("function shadowing the parameter", () => {
    expect(() =>
      Parametrizer.parse("t", { functions: { T: Math.abs } }),
    ).toThrow("function name collides with parameter: T");
    expect(() => Parametrizer.parse("sin", { param: "sin" })).toThrow(
      "function name collides with parameter: sin",
    );
  });

  test("invalid parameter name", () => {
    expect(() => Parametrizer.parse("t", { param: "t t" })).toThrow(
      "invalid identifier: t t",
    );
  });
});

test("toString", () => {
  expect(Parametrizer.parse("1+2*T*t").toString()).toBe("1 + 2 * t * t");
});
