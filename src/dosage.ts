import { defaultDosingRules } from "./rules";
import type {
  DosageOutcome,
  DosageRequest,
  DosageSummary,
  DosingRules,
  RawRecord,
  SkippedDosage,
} from "./types";

export const REQUIRED_DOSAGE_FIELDS = [
  "weight",
  "medication",
  "is_first_dose",
] as const;

/**
 * Computes the dosage for a single request.
 *
 * Dosing formula:
 * - base = weight (kg) x factor (mg/kg)
 * - final = base x 2 when `is_first_dose` is true and the medication takes a
 *   loading dose, otherwise base
 *
 * Unknown medications get factor 0 (dosage 0), not an error. Requests missing
 * a required field, or with a weight that is not a positive number, come back
 * as `skipped`. The input record is not modified, and its fields are carried
 * into the result as given; only `loading_dose_applied` reflects how
 * `is_first_dose` was read.
 */
export function calculateDosage(
  request: DosageRequest,
  rules: DosingRules = defaultDosingRules()
): DosageOutcome {
  const missing = REQUIRED_DOSAGE_FIELDS.filter((key) => !(key in request));
  if (missing.length > 0) {
    return {
      status: "skipped",
      reason: `missing required fields: ${missing.join(", ")}`,
      record: request,
    };
  }

  const { weight, medication, is_first_dose } = request;
  if (typeof weight !== "number" || !Number.isFinite(weight) || weight <= 0) {
    return {
      status: "skipped",
      reason: `invalid weight: ${JSON.stringify(weight)}`,
      record: request,
    };
  }

  // Non-string medication names match no table entry.
  const med = typeof medication === "string" ? medication : null;
  const firstDose = is_first_dose === true;

  const factor = med === null ? 0 : rules.factors.get(med) ?? 0;
  const baseDosage = weight * factor;

  const loadingDoseApplied =
    firstDose && med !== null && rules.loadingDoseMedications.has(med);
  const finalDosage = loadingDoseApplied ? baseDosage * 2 : baseDosage;

  const warnings = med === null ? [] : [...(rules.warnings.get(med) ?? [])];

  return {
    status: "calculated",
    result: {
      ...request,
      weight,
      base_dosage: baseDosage,
      loading_dose_applied: loadingDoseApplied,
      final_dosage: finalDosage,
      warnings,
    },
  };
}

/**
 * Calculates dosages for a batch and sums the final dosages.
 *
 * Skipped requests are collected with their position in the input and left
 * out of both `results` and `totalDosage`; the batch always runs to the end.
 */
export function calculateAllDosages(
  requests: RawRecord[],
  rules: DosingRules = defaultDosingRules()
): DosageSummary {
  const results = [];
  const skipped: SkippedDosage[] = [];
  let totalDosage = 0;

  for (const [index, request] of requests.entries()) {
    const outcome = calculateDosage(request, rules);
    if (outcome.status === "skipped") {
      skipped.push({ index, reason: outcome.reason, record: outcome.record });
      continue;
    }
    results.push(outcome.result);
    totalDosage += outcome.result.final_dosage;
  }

  return { results, skipped, totalDosage };
}
