import { readFileSync } from "node:fs";
import { InputFileNotFoundError, InvalidInputError } from "./errors";
import { parseDosingRules } from "./rules";
import type { DosingRules, RawRecord } from "./types";

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string")
    return err.code;
  return undefined;
}

function readText(path: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") throw new InputFileNotFoundError(path);
    // EISDIR, EACCES and the like: the path exists but is not a readable file.
    const detail = err instanceof Error ? err.message : String(err);
    throw new InvalidInputError(`Cannot read ${path}: ${detail}`);
  }
}

/**
 * Reads and parses a whole JSON file.
 *
 * Throws `InputFileNotFoundError` if the file is absent and
 * `InvalidInputError` if it cannot be read or is not valid JSON.
 */
export function loadJson(path: string): unknown {
  const text = readText(path);
  try {
    return JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new InvalidInputError(`Invalid JSON in ${path}: ${detail}`);
  }
}

/**
 * Loads an ordered list of records from a JSON file.
 *
 * The file must hold an array of objects:
 *
 * ```json
 * [{ "name": "john smith", "age": "32", "gender": "male", "diagnosis": "flu" }]
 * ```
 */
export function loadRecords(path: string): RawRecord[] {
  const data = loadJson(path);
  if (!Array.isArray(data))
    throw new InvalidInputError(`Expected a JSON array of records in ${path}.`);

  const records: RawRecord[] = [];
  for (const [index, item] of data.entries()) {
    if (!isRecord(item)) {
      throw new InvalidInputError(
        `Record #${index} in ${path} is not an object.`
      );
    }
    records.push(item);
  }
  return records;
}

/**
 * Loads dosing tables from a rules document (see `parseDosingRules`).
 */
export function loadDosingRules(path: string): DosingRules {
  return parseDosingRules(loadJson(path));
}
