import { ConfigurationError } from "../errors/errors";

/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = string;

export type TodayProvider = () => IsoDate;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (value: number, width: number) => String(value).padStart(width, "0");

const toUtcMillis = (value: string): number | undefined => {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return undefined;

  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const millis = Date.UTC(year, month - 1, day);
  const check = new Date(millis);

  // rejects 2024-02-30 and friends, which Date.UTC silently rolls over
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return undefined;
  }
  return millis;
};

const fromUtcMillis = (millis: number): IsoDate => {
  const date = new Date(millis);
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
};

export const isIsoDate = (value: unknown): value is IsoDate =>
  typeof value === "string" && toUtcMillis(value) !== undefined;

export const parseIsoDate = (name: string, value: unknown): IsoDate => {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigurationError(`${name} is required and must be a YYYY-MM-DD date`);
  }

  const normalized = value.trim();
  if (!isIsoDate(normalized)) {
    throw new ConfigurationError(`${name} must be a valid YYYY-MM-DD date. Received: ${value}`);
  }
  return normalized;
};

export const addDays = (date: IsoDate, days: number): IsoDate => {
  const millis = toUtcMillis(date);
  if (millis === undefined) {
    throw new RangeError(`Not a calendar date: ${date}`);
  }
  return fromUtcMillis(millis + days * DAY_MS);
};

/** Negative when `a` is before `b`, zero when equal. */
export const compareIsoDates = (a: IsoDate, b: IsoDate): number => {
  const left = toUtcMillis(a);
  const right = toUtcMillis(b);
  if (left === undefined || right === undefined) {
    throw new RangeError(`Cannot compare ${a} with ${b}`);
  }
  return left - right;
};

/** The local calendar date of `now`; the operator's "today". */
export const toLocalIsoDate = (now: Date): IsoDate =>
  `${pad(now.getFullYear(), 4)}-${pad(now.getMonth() + 1, 2)}-${pad(now.getDate(), 2)}`;

export const systemToday: TodayProvider = () => toLocalIsoDate(new Date());
