import {
  defaultExtractorConfig,
  type ExtractorConfig,
  extractorCaps,
  validateExtractorConfig
} from "../../application/extract-complaints/extractor.config";
import { parseIsoDate, type IsoDate } from "../dates/calendarDate";
import { ConfigurationError } from "../errors/errors";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 60000 },
  concurrency: { min: 1, max: 10 }
} as const;

export const defaultCompanies: readonly string[] = [
  "JPMORGAN CHASE & CO.",
  "BANK OF AMERICA, NATIONAL ASSOCIATION",
  "WELLS FARGO & COMPANY",
  "CITIBANK, N.A.",
  "CAPITAL ONE FINANCIAL CORPORATION"
];

export const defaultStartDate: IsoDate = "2024-01-01";

export type RuntimeConfig = {
  companies: string[];
  startDate: IsoDate;
  extractorConfig: ExtractorConfig;
  timeoutMs: number;
  concurrency: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigurationError(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

/**
 * Comma-separated, order preserving. Company names containing commas
 * (e.g. "BANK OF AMERICA, NATIONAL ASSOCIATION") are written with `;` instead.
 */
export const parseCompanies = (raw: string | undefined): string[] => {
  if (raw == null || raw.trim() === "") return [...defaultCompanies];

  const separator = raw.includes(";") ? ";" : ",";
  const companies = raw
    .split(separator)
    .map((company) => company.trim())
    .filter((company) => company !== "");

  if (companies.length === 0) {
    throw new ConfigurationError("CFPB_COMPANIES must name at least one company");
  }

  const duplicate = companies.find((company, index) => companies.indexOf(company) !== index);
  if (duplicate !== undefined) {
    throw new ConfigurationError(`CFPB_COMPANIES lists ${duplicate} more than once`);
  }

  return companies;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const extractorConfig = validateExtractorConfig({
    pageSize: parseOptionalIntInRange(env, "CFPB_PAGE_SIZE", extractorCaps.pageSize) ?? defaultExtractorConfig.pageSize,
    maxPages: parseOptionalIntInRange(env, "CFPB_MAX_PAGES", extractorCaps.maxPages) ?? defaultExtractorConfig.maxPages
  });

  const startDate = parseIsoDate("CFPB_START_DATE", env.CFPB_START_DATE?.trim() ? env.CFPB_START_DATE : defaultStartDate);
  const timeoutMs = parseOptionalIntInRange(env, "CFPB_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 15000;
  const concurrency = parseOptionalIntInRange(env, "LOAD_CONCURRENCY", runtimeCaps.concurrency) ?? 1;

  return {
    companies: parseCompanies(env.CFPB_COMPANIES),
    startDate,
    extractorConfig,
    timeoutMs,
    concurrency
  };
};
