import { ConfigurationError } from "../errors/errors";

export type StateBackend = "file" | "mongo";

export type Env = {
  MONGO_URI: string;
  MONGO_DB_NAME: string;
  CFPB_BASE_URL: string;
  STATE_BACKEND: StateBackend;
  STATE_FILE: string;
};

export const defaultCfpbBaseUrl = "https://www.consumerfinance.gov/data-research/consumer-complaints/search/api/v1/";

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigurationError(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const parseStateBackend = (raw: string | undefined): StateBackend => {
  const value = raw?.trim().toLowerCase() || "file";
  if (value !== "file" && value !== "mongo") {
    throw new ConfigurationError(`STATE_BACKEND must be "file" or "mongo". Received: ${raw}`);
  }
  return value;
};

const nonEmpty = (raw: string | undefined, fallback: string): string => {
  const value = raw?.trim();
  return value ? value : fallback;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = nonEmpty(env.MONGO_URI, "mongodb://localhost:27017/cfpb");
  const MONGO_DB_NAME = nonEmpty(env.MONGO_DB_NAME, "cfpb");
  const CFPB_BASE_URL = validateHttpUrl("CFPB_BASE_URL", nonEmpty(env.CFPB_BASE_URL, defaultCfpbBaseUrl));
  const STATE_BACKEND = parseStateBackend(env.STATE_BACKEND);
  const STATE_FILE = nonEmpty(env.STATE_FILE, "state/load_state.json");

  return { MONGO_URI, MONGO_DB_NAME, CFPB_BASE_URL, STATE_BACKEND, STATE_FILE };
};
