import type { IsoDate } from "../../shared/dates/calendarDate";

export type ComplaintDoc = {
  _id: string; // UUIDv4
  complaintId: string; // CFPB complaint_id
  company: string;
  dateReceived?: IsoDate;
  product?: string;
  issue?: string;
  state?: string;
  raw: Record<string, unknown>;
};
