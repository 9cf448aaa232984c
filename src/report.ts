import type { DosageSummary, PatientRecord, SkippedDosage } from "./types";

function mg(value: number): string {
  return `${value.toFixed(2)} mg`;
}

/**
 * Console lines for the cleaner.
 */
export function formatCleanedReport(patients: PatientRecord[]): string[] {
  if (patients.length === 0) return ["No valid patient records found."];

  return [
    "Cleaned Patient Data:",
    ...patients.map(
      (p) => `Name: ${p.name}, Age: ${p.age}, Diagnosis: ${p.diagnosis ?? ""}`
    ),
  ];
}

/**
 * Diagnostic for a request the calculator skipped. Uses the patient name when
 * the record has one, otherwise its position in the input.
 */
export function formatSkippedNotice(skipped: SkippedDosage): string {
  const { name } = skipped.record;
  const label =
    typeof name === "string" && name.trim()
      ? name.trim()
      : `#${skipped.index}`;
  return `Skipping record ${label}: ${skipped.reason}`;
}

/**
 * Console lines for the dosage calculator, ending with the batch total.
 */
export function formatDosageReport(summary: DosageSummary): string[] {
  const lines: string[] = [];

  if (summary.results.length === 0) {
    lines.push("No valid medication records found.");
  } else {
    lines.push("Medication Dosages:");
    for (const r of summary.results) {
      const name = r.name === undefined || r.name === null ? "" : String(r.name);
      lines.push(
        `Name: ${name}, Medication: ${String(r.medication)}, ` +
          `Base Dosage: ${mg(r.base_dosage)}, Final Dosage: ${mg(r.final_dosage)}`
      );
      if (r.loading_dose_applied) lines.push("Loading dose applied");
      if (r.warnings.length > 0)
        lines.push(`Warnings: ${r.warnings.join(", ")}`);
    }
  }

  lines.push("", `Total medication needed: ${mg(summary.totalDosage)}`);
  return lines;
}
