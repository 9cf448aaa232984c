/**
 * Generic record shape as loaded from an input file.
 *
 * Input files are hand-maintained and not strictly typed, so records are
 * modeled as arbitrary objects and the rules parse the fields they need.
 */
export type RawRecord = Record<string, unknown>;

/**
 * A patient record after cleaning.
 *
 * Exactly the four canonical fields; `age` is an integer >= 18.
 */
export type PatientRecord = {
  name: string;
  age: number;
  gender: string | null;
  diagnosis: string | null;
};

/**
 * A dosage request as read from the medications file.
 *
 * `weight`, `medication` and `is_first_dose` are required by the calculator;
 * `allergies` is carried through untouched.
 */
export type DosageRequest = RawRecord & {
  name?: unknown;
  weight?: unknown;
  medication?: unknown;
  condition?: unknown;
  is_first_dose?: unknown;
  allergies?: unknown;
};

/**
 * A dosage request with the computed dosing fields attached.
 */
export type DosageResult = DosageRequest & {
  weight: number;
  base_dosage: number;
  loading_dose_applied: boolean;
  final_dosage: number;
  warnings: string[];
};

/**
 * A request the calculator did not process, with its position in the input
 * and the reason it was left out.
 */
export type SkippedDosage = {
  index: number;
  reason: string;
  record: RawRecord;
};

/**
 * Per-record outcome of the dosage calculator.
 *
 * A skipped record is never reported as a zero dosage.
 */
export type DosageOutcome =
  | { status: "calculated"; result: DosageResult }
  | { status: "skipped"; reason: string; record: RawRecord };

/**
 * Batch output of the dosage calculator: calculated results in input order,
 * skipped requests, and the sum of `final_dosage` over the results.
 */
export type DosageSummary = {
  results: DosageResult[];
  skipped: SkippedDosage[];
  totalDosage: number;
};

/**
 * Lookup tables driving the dosage calculator.
 */
export type DosingRules = {
  /** mg per kg of body weight, keyed by exact medication name. */
  factors: ReadonlyMap<string, number>;
  /** Medications whose first administration is doubled. */
  loadingDoseMedications: ReadonlySet<string>;
  warnings: ReadonlyMap<string, readonly string[]>;
};
