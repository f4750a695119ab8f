import { Parametrizer, type ParseOptions } from "@parametrize/core";

/** `steps + 1` evenly spaced points from `from` to `to`, both included. */
export const samples = (from: number, to: number, steps: number): number[] =>
  Array.from({ length: steps + 1 }, (_, i) => from + ((to - from) * i) / steps);

export const evalLines = (
  expression: string,
  values: number[],
  options: ParseOptions,
): string[] => {
  const f = Parametrizer.parse(expression, options);
  return values.map((t) => `f(${t}) = ${f.evaluate(t)}`);
};

export const sampleLines = (
  expression: string,
  { from, to, steps }: { from: number; to: number; steps: number },
  options: ParseOptions,
): string[] => {
  const f = Parametrizer.parse(expression, options);
  return samples(from, to, steps).map((t) => `${t}\t${f.evaluate(t)}`);
};

export const printLines = (
  expression: string,
  options: ParseOptions,
): string[] => [Parametrizer.parse(expression, options).toString()];
