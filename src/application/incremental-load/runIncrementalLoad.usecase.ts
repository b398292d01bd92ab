import type { WatermarkStore } from "../../core/watermark/WatermarkStore";
import type { ComplaintLoader, LoadWindow } from "../../ports/ComplaintLoader";
import { createLimiter } from "../../shared/concurrency/limiter";
import { compareIsoDates, type IsoDate } from "../../shared/dates/calendarDate";
import { ConfigurationError, toErrorMessage } from "../../shared/errors/errors";
import {
  type AttemptedRunSummary,
  type CompanyRunResult,
  formatDateRange,
  type RunSummary,
  summarizeResults,
  WatermarkAdvanceError
} from "./run.summary";

export type RunIncrementalLoadDeps = {
  watermarkStore: WatermarkStore;
  loader: ComplaintLoader;
  companies: readonly string[];
  startDate: string;
  today?: IsoDate;
  concurrency?: number;
};

const assertCompanySet = (companies: readonly string[]) => {
  if (companies.length === 0) {
    throw new ConfigurationError("At least one company must be configured");
  }

  const seen = new Set<string>();
  for (const company of companies) {
    if (company.trim() === "") {
      throw new ConfigurationError("Company identifiers must be non-empty");
    }
    if (seen.has(company)) {
      throw new ConfigurationError(`Duplicate company identifier: ${company}`);
    }
    seen.add(company);
  }
};

const loadCompany = async (
  loader: ComplaintLoader,
  window: LoadWindow,
  company: string
): Promise<CompanyRunResult> => {
  try {
    const info = await loader.extractAndLoad({ ...window, company });
    return { company, status: "success", dateRange: window, info };
  } catch (err) {
    const error = toErrorMessage(err);
    console.error(JSON.stringify({ event: "run.company_failed", company, dateRange: formatDateRange(window), error }));
    return { company, status: "failed", dateRange: window, error };
  }
};

const logCompleted = (summary: AttemptedRunSummary) => {
  console.log(
    JSON.stringify({
      event: "run.completed",
      status: summary.status,
      dateRange: formatDateRange(summary.dateRange),
      successful: summary.successful,
      failed: summary.failed,
      total: summary.totalCompanies
    })
  );
};

/**
 * One incremental cycle: compute the window, load every company, and advance
 * the watermark to `dateMax` only when all of them succeeded.
 */
export const runIncrementalLoad = async (deps: RunIncrementalLoadDeps): Promise<RunSummary> => {
  const { watermarkStore, loader, companies } = deps;
  assertCompanySet(companies);

  const window = await watermarkStore.getNextLoadDate(deps.startDate, deps.today);

  if (compareIsoDates(window.dateMin, window.dateMax) > 0) {
    console.log(JSON.stringify({ event: "run.skipped", reason: "up_to_date", dateRange: formatDateRange(window) }));
    return { status: "skipped", message: "Already up to date", lastDate: window.dateMax, dateRange: window };
  }

  console.log(
    JSON.stringify({ event: "run.started", companies: companies.length, dateRange: formatDateRange(window) })
  );

  // results keep configured order whatever the concurrency
  const limit = createLimiter(deps.concurrency ?? 1);
  const results = await Promise.all(companies.map((company) => limit(() => loadCompany(loader, window, company))));

  const pending = summarizeResults(window, results, false);
  if (pending.successful !== pending.totalCompanies) {
    console.warn(
      JSON.stringify({
        event: "run.watermark_unchanged",
        successful: pending.successful,
        total: pending.totalCompanies
      })
    );
    logCompleted(pending);
    return pending;
  }

  try {
    await watermarkStore.updateLastLoadedDate(window.dateMax);
  } catch (err) {
    throw new WatermarkAdvanceError(pending, err);
  }
  console.log(JSON.stringify({ event: "run.watermark_advanced", lastLoadedDate: window.dateMax }));

  const summary = { ...pending, watermarkAdvanced: true };
  logCompleted(summary);
  return summary;
};
