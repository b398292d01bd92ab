import { ConfigurationError } from "../../shared/errors/errors";

export type ExtractorConfig = {
  pageSize: number;
  maxPages: number;
};

export type ExtractorConfigInput = Partial<ExtractorConfig>;

export const defaultExtractorConfig: ExtractorConfig = {
  pageSize: 1000,
  maxPages: 1000
};

export const extractorCaps = {
  pageSize: { min: 1, max: 10000 },
  maxPages: { min: 1, max: 100000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateExtractorConfig = (config: ExtractorConfig): ExtractorConfig => {
  assertIntegerInRange("pageSize", config.pageSize, extractorCaps.pageSize.min, extractorCaps.pageSize.max);
  assertIntegerInRange("maxPages", config.maxPages, extractorCaps.maxPages.min, extractorCaps.maxPages.max);
  return config;
};

export const resolveExtractorConfig = (input: ExtractorConfigInput = {}): ExtractorConfig =>
  validateExtractorConfig({ ...defaultExtractorConfig, ...input });
