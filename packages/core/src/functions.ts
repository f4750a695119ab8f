import type { UnaryFn } from "./term.js";

export type Functions = Readonly<Record<string, UnaryFn>>;

export const defaultFunctions: Functions = {
  abs: Math.abs,
  acos: Math.acos,
  acosh: Math.acosh,
  asin: Math.asin,
  asinh: Math.asinh,
  atan: Math.atan,
  atanh: Math.atanh,
  cbrt: Math.cbrt,
  ceil: Math.ceil,
  cos: Math.cos,
  cosh: Math.cosh,
  exp: Math.exp,
  expm1: Math.expm1,
  floor: Math.floor,
  ln: Math.log,
  log: Math.log,
  log10: Math.log10,
  log1p: Math.log1p,
  log2: Math.log2,
  sign: Math.sign,
  sin: Math.sin,
  sinh: Math.sinh,
  sqrt: Math.sqrt,
  tan: Math.tan,
  tanh: Math.tanh,
  trunc: Math.trunc,
};

const identifier = /^[a-z_]\w*$/;

/** Lowercases and checks a name the way the lexer will see it. */
export const normalizeName = (name: string): string => {
  const lower = name.toLowerCase();
  if (!identifier.test(lower)) throw Error(`invalid identifier: ${name}`);
  return lower;
};

/**
 * Builds the lookup table the parser resolves function names against.
 * Throws if a name is not an identifier or would shadow the parameter.
 */
export const functionTable = (
  functions: Functions,
  param: string,
): Map<string, UnaryFn> => {
  const table = new Map<string, UnaryFn>();
  for (const [name, f] of Object.entries(functions)) {
    const key = normalizeName(name);
    if (key === param)
      throw Error(`function name collides with parameter: ${name}`);
    table.set(key, f);
  }
  return table;
};
