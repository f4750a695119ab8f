import { ParseError } from "@parametrize/core";
import yargs from "yargs";
import { evalLines, printLines, sampleLines } from "./commands.js";

const run = (lines: () => string[]) => {
  try {
    for (const line of lines()) console.log(line);
  } catch (e) {
    if (!(e instanceof ParseError)) throw e;
    console.error(`error: ${e.message}`);
    process.exitCode = 1;
  }
};

/** The `parametrize` command line over `args`, ready to parse. */
export const cli = (args: string[]) =>
  yargs(args)
    .scriptName("parametrize")
    .option("param", {
      type: "string",
      default: "t",
      describe: "name of the parameter",
    })
    .command(
      "eval <expression> [values..]",
      "evaluate an expression at each value",
      (y) =>
        y
          .positional("expression", { type: "string", demandOption: true })
          .positional("values", { type: "number", array: true }),
      ({ expression, values, param }) =>
        run(() => evalLines(expression, values ?? [], { param })),
    )
    .command(
      "sample <expression>",
      "evaluate an expression at evenly spaced points",
      (y) =>
        y
          .positional("expression", { type: "string", demandOption: true })
          .option("from", { type: "number", default: 0 })
          .option("to", { type: "number", default: 1 })
          .option("steps", { type: "number", default: 10 })
          .check(({ steps }) => {
            if (!Number.isInteger(steps) || steps < 1)
              throw Error("--steps must be a positive integer");
            return true;
          }),
      ({ expression, from, to, steps, param }) =>
        run(() => sampleLines(expression, { from, to, steps }, { param })),
    )
    .command(
      "print <expression>",
      "print an expression in canonical form",
      (y) => y.positional("expression", { type: "string", demandOption: true }),
      ({ expression, param }) => run(() => printLines(expression, { param })),
    )
    .demandCommand()
    .strict()
    .help();
