import { InvalidInputError } from "./errors";
import type { DosingRules } from "./types";

/**
 * Standard dosing factors (mg per kg of body weight).
 */
const DOSAGE_FACTORS: ReadonlyArray<readonly [string, number]> = Object.freeze([
  ["epinephrine", 0.01], // Anaphylaxis
  ["amiodarone", 5.0], // Cardiac arrest
  ["lorazepam", 0.05], // Seizures
  ["fentanyl", 0.001], // Pain
  ["lisinopril", 0.5],
  ["metformin", 10.0],
  ["oseltamivir", 2.5],
  ["sumatriptan", 1.0],
  ["albuterol", 0.1],
  ["ibuprofen", 5.0],
  ["sertraline", 1.5],
  ["levothyroxine", 0.02],
] as const);

const LOADING_DOSE_MEDICATIONS: readonly string[] = Object.freeze([
  "amiodarone",
  "lorazepam",
  "fentanyl",
]);

const MEDICATION_WARNINGS: ReadonlyArray<readonly [string, readonly string[]]> =
  Object.freeze([
    ["epinephrine", Object.freeze(["Monitor for arrhythmias"])],
    ["amiodarone", Object.freeze(["Monitor for hypotension"])],
    ["fentanyl", Object.freeze(["Monitor for respiratory depression"])],
  ] as const);

/**
 * Built-in dosing tables.
 *
 * Returns new lookup maps on every call; the tables behind them are frozen.
 */
export function defaultDosingRules(): DosingRules {
  return {
    factors: new Map(DOSAGE_FACTORS),
    loadingDoseMedications: new Set(LOADING_DOSE_MEDICATIONS),
    warnings: new Map(MEDICATION_WARNINGS),
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * Builds `DosingRules` from a JSON rules document:
 *
 * ```json
 * {
 *   "factors": { "epinephrine": 0.01 },
 *   "loadingDoseMedications": ["amiodarone"],
 *   "warnings": { "epinephrine": ["Monitor for arrhythmias"] }
 * }
 * ```
 *
 * `loadingDoseMedications` and `warnings` may be omitted (empty).
 */
export function parseDosingRules(doc: unknown): DosingRules {
  if (!isPlainObject(doc))
    throw new InvalidInputError("Dosing rules must be a JSON object.");

  const { factors, loadingDoseMedications = [], warnings = {} } = doc;

  if (!isPlainObject(factors))
    throw new InvalidInputError("Dosing rules: `factors` must be an object.");

  const factorMap = new Map<string, number>();
  for (const [medication, factor] of Object.entries(factors)) {
    if (typeof factor !== "number" || !Number.isFinite(factor) || factor < 0) {
      throw new InvalidInputError(
        `Dosing rules: factor for "${medication}" must be a non-negative number.`
      );
    }
    factorMap.set(medication, factor);
  }

  if (!isStringArray(loadingDoseMedications)) {
    throw new InvalidInputError(
      "Dosing rules: `loadingDoseMedications` must be an array of strings."
    );
  }

  if (!isPlainObject(warnings))
    throw new InvalidInputError("Dosing rules: `warnings` must be an object.");

  const warningMap = new Map<string, readonly string[]>();
  for (const [medication, list] of Object.entries(warnings)) {
    if (!isStringArray(list)) {
      throw new InvalidInputError(
        `Dosing rules: warnings for "${medication}" must be an array of strings.`
      );
    }
    warningMap.set(medication, [...list]);
  }

  return {
    factors: factorMap,
    loadingDoseMedications: new Set(loadingDoseMedications),
    warnings: warningMap,
  };
}
