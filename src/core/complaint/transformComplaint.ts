import { randomUUID } from "crypto";
import { isIsoDate } from "../../shared/dates/calendarDate";
import type { ComplaintDoc } from "./complaint.types";

export class InvalidComplaintError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidComplaintError";
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseComplaintId = (value: unknown): string => {
  if (value == null) {
    throw new InvalidComplaintError("Invalid complaint: missing complaint_id");
  }

  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw new InvalidComplaintError("Invalid complaint: complaint_id must be a positive integer");
    }
    return String(value);
  }

  if (typeof value === "string") {
    const normalized = value.trim();
    if (!/^\d+$/.test(normalized) || /^0+$/.test(normalized)) {
      throw new InvalidComplaintError("Invalid complaint: complaint_id is not numeric");
    }
    return normalized.replace(/^0+/, "");
  }

  throw new InvalidComplaintError("Invalid complaint: complaint_id is not numeric");
};

const optionalText = (value: unknown): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

// the API returns `2024-01-05T12:00:00-05:00`; only the calendar part is kept
const parseDateReceived = (value: unknown): string | undefined => {
  if (typeof value !== "string") return undefined;
  const datePart = value.trim().slice(0, 10);
  return isIsoDate(datePart) ? datePart : undefined;
};

/**
 * Maps one search hit to a complaint document. Accepts either the hit itself
 * (`{ _source: {...} }`) or the bare `_source` record.
 */
export const transformComplaint = (hit: unknown, fallbackCompany: string): ComplaintDoc => {
  if (!isRecord(hit)) {
    throw new InvalidComplaintError("Invalid complaint: search hit is not an object");
  }

  const source = isRecord(hit._source) ? hit._source : hit;
  const complaintId = parseComplaintId(source.complaint_id);

  return {
    _id: randomUUID(),
    complaintId,
    company: optionalText(source.company) ?? fallbackCompany,
    dateReceived: parseDateReceived(source.date_received),
    product: optionalText(source.product),
    issue: optionalText(source.issue),
    state: optionalText(source.state),
    raw: source
  };
};
