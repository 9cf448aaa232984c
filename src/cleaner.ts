import type { PatientRecord, RawRecord } from "./types";

export const MINIMUM_AGE = 18;

/**
 * Stringifies unknown values safely.
 *
 * Normalizes `null`/`undefined` into an empty string.
 */
function asString(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/**
 * Keeps text fields as text and turns missing values into `null` so every
 * cleaned record has the same shape.
 */
function asNullableString(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return String(value);
}

/**
 * Title-cases a name: the first letter of every run of letters is
 * upper-cased and the rest lower-cased.
 *
 * - "john smith" -> "John Smith"
 * - "MARY o'neil" -> "Mary O'Neil"
 */
export function titleCase(value: unknown): string {
  return asString(value).replace(
    /\p{L}+/gu,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
  );
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Coerces an age to an integer.
 * - Accepts finite numbers and decimal strings ("32", " 41 ", "67.8")
 * - Fractions are truncated
 * - Anything else (missing, empty, "thirty", "0x20", booleans) becomes 0
 */
export function coerceAge(value: unknown): number {
  let n = Number.NaN;
  if (typeof value === "number") n = value;
  else if (typeof value === "string" && DECIMAL.test(value.trim()))
    n = Number(value.trim());

  if (!Number.isFinite(n)) return 0;
  return Math.trunc(n) || 0;
}

/**
 * Normalizes a single record into the canonical four-field shape.
 *
 * Does not filter; see `cleanPatientRecords(...)`.
 */
export function cleanPatientRecord(raw: RawRecord): PatientRecord {
  return {
    name: titleCase(raw.name),
    age: coerceAge(raw.age),
    gender: asNullableString(raw.gender),
    diagnosis: asNullableString(raw.diagnosis),
  };
}

function recordKey(p: PatientRecord): string {
  return JSON.stringify([p.name, p.age, p.gender, p.diagnosis]);
}

/**
 * Cleans a batch of patient records.
 *
 * Order of rules:
 * 1) Normalize every record (fill fields, coerce age, title-case name).
 * 2) Drop duplicates of an earlier normalized record.
 * 3) Keep only adults (`age >= 18`).
 *
 * Ages are coerced before the filter, so an unparseable age is always 0 and
 * always dropped. Input order is preserved.
 */
export function cleanPatientRecords(records: RawRecord[]): PatientRecord[] {
  const seen = new Set<string>();
  const cleaned: PatientRecord[] = [];

  for (const raw of records) {
    const p = cleanPatientRecord(raw);
    const key = recordKey(p);
    if (seen.has(key)) continue;
    seen.add(key);

    if (p.age < MINIMUM_AGE) continue;
    cleaned.push(p);
  }

  return cleaned;
}
