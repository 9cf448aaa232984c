import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  InputFileNotFoundError,
  InvalidInputError,
  UsageError,
} from "./errors";
import { loadDosingRules } from "./loader";
import { runCleaner, runDosageCalculator } from "./pipelines";
import { defaultDosingRules } from "./rules";

const COMMANDS = ["clean", "dosage"] as const;
type Command = (typeof COMMANDS)[number];

const DEFAULT_INPUT: Record<Command, string> = {
  clean: "data/raw/patients.json",
  dosage: "data/raw/meds.json",
};

export const USAGE =
  "Usage: tsx src/cli.ts <clean|dosage> [--input path] [--rules path] [--out path]";

/**
 * Reads a flag value from argv.
 *
 * Supports both styles:
 * - `--input data.json`
 * - `--input=data.json`
 *
 * Returns `null` if the flag is not present or has no value.
 */
function getArgValue(flag: string): string | null {
  const idx = process.argv.findIndex(
    (a) => a === flag || a.startsWith(`${flag}=`)
  );
  if (idx === -1) return null;
  const a = process.argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = process.argv[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

/**
 * Picks the command from `CLINICAL_BATCH_COMMAND` or the first positional
 * argument (`tsx src/cli.ts dosage`).
 */
function getCommand(): Command | null {
  const fromEnv = process.env.CLINICAL_BATCH_COMMAND;
  if (isCommand(fromEnv)) return fromEnv;
  const positional = process.argv[2];
  return isCommand(positional) ? positional : null;
}

/**
 * CLI entrypoint.
 *
 * 1) Resolve the command and paths (env vars, then flags, then defaults).
 * 2) Run the pipeline, which prints its own report.
 * 3) Optionally write the processed records to `--out`.
 *
 * Runs synchronously end to end; input and usage problems are thrown for
 * `main()` to report.
 */
export function runCli(): void {
  const command = getCommand();
  if (!command) throw new UsageError(USAGE);

  const inputPath = resolve(
    process.env.CLINICAL_BATCH_INPUT ||
      getArgValue("--input") ||
      DEFAULT_INPUT[command]
  );
  const outPath = process.env.CLINICAL_BATCH_OUT || getArgValue("--out");

  let output: unknown;
  if (command === "clean") {
    output = runCleaner(inputPath);
  } else {
    const rulesPath = process.env.CLINICAL_BATCH_RULES || getArgValue("--rules");
    const rules = rulesPath
      ? loadDosingRules(resolve(rulesPath))
      : defaultDosingRules();
    const summary = runDosageCalculator(inputPath, rules);
    output = { results: summary.results, totalDosage: summary.totalDosage };
  }

  if (outPath) {
    writeFileSync(outPath, JSON.stringify(output, null, 2), "utf8");
    console.log(`\nWrote ${outPath}`);
  }
}

function isInputProblem(err: unknown): err is Error {
  return (
    err instanceof UsageError ||
    err instanceof InputFileNotFoundError ||
    err instanceof InvalidInputError
  );
}

/**
 * Runs the CLI and exits non-zero on failure.
 *
 * Input problems end the run with a one-line diagnostic; anything else is
 * unexpected and printed in full.
 */
export function main(): void {
  try {
    runCli();
  } catch (err) {
    if (isInputProblem(err)) {
      console.error(err.message);
    } else {
      console.error("Fatal error:", err);
    }
    process.exit(1);
  }
}

main();
