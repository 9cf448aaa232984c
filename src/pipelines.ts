import { cleanPatientRecords } from "./cleaner";
import { calculateAllDosages } from "./dosage";
import { loadRecords } from "./loader";
import {
  formatCleanedReport,
  formatDosageReport,
  formatSkippedNotice,
} from "./report";
import { defaultDosingRules } from "./rules";
import type { DosageSummary, DosingRules, PatientRecord } from "./types";

/**
 * Patient cleaner pipeline: load -> clean -> print.
 *
 * Returns the cleaned records so callers (and tests) can reuse them.
 * Load errors propagate; the CLI decides how to exit.
 */
export function runCleaner(inputPath: string): PatientRecord[] {
  const patients = loadRecords(inputPath);
  const cleaned = cleanPatientRecords(patients);

  for (const line of formatCleanedReport(cleaned)) console.log(line);
  return cleaned;
}

/**
 * Dosage pipeline: load -> calculate -> print.
 *
 * Skipped requests are reported on stderr and do not stop the batch.
 */
export function runDosageCalculator(
  inputPath: string,
  rules: DosingRules = defaultDosingRules()
): DosageSummary {
  const requests = loadRecords(inputPath);
  const summary = calculateAllDosages(requests, rules);

  for (const s of summary.skipped) console.warn(formatSkippedNotice(s));
  for (const line of formatDosageReport(summary)) console.log(line);
  return summary;
}
