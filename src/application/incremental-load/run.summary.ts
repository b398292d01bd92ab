import type { ExtractionInfo, LoadWindow } from "../../ports/ComplaintLoader";
import type { IsoDate } from "../../shared/dates/calendarDate";
import { PersistenceError, toErrorMessage } from "../../shared/errors/errors";

export type CompanyRunResult =
  | { company: string; status: "success"; dateRange: LoadWindow; info: ExtractionInfo }
  | { company: string; status: "failed"; dateRange: LoadWindow; error: string };

export type SkippedRunSummary = {
  status: "skipped";
  message: "Already up to date";
  lastDate: IsoDate;
  dateRange: LoadWindow;
};

export type AttemptedRunSummary = {
  status: "completed" | "partial_failure";
  dateRange: LoadWindow;
  totalCompanies: number;
  successful: number;
  failed: number;
  watermarkAdvanced: boolean;
  results: CompanyRunResult[];
};

export type RunSummary = SkippedRunSummary | AttemptedRunSummary;

export const formatDateRange = (window: LoadWindow) => `${window.dateMin} to ${window.dateMax}`;

export const summarizeResults = (
  dateRange: LoadWindow,
  results: CompanyRunResult[],
  watermarkAdvanced: boolean
): AttemptedRunSummary => {
  const successful = results.filter((r) => r.status === "success").length;
  const failed = results.length - successful;
  return {
    status: failed === 0 ? "completed" : "partial_failure",
    dateRange,
    totalCompanies: results.length,
    successful,
    failed,
    watermarkAdvanced,
    results
  };
};

/**
 * Every company loaded but the watermark could not be advanced. The next run
 * will reload the same window; `summary` describes what was loaded.
 */
export class WatermarkAdvanceError extends PersistenceError {
  readonly summary: AttemptedRunSummary;

  constructor(summary: AttemptedRunSummary, cause: unknown) {
    super({
      code: "watermark_update_failed",
      operation: "write",
      message: `All ${summary.totalCompanies} companies loaded for ${formatDateRange(summary.dateRange)} but the watermark was not advanced: ${toErrorMessage(cause)}`,
      cause
    });
    this.name = "WatermarkAdvanceError";
    this.summary = summary;
  }
}
