import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

type IndexPlan = { keys: IndexSpecification; options: CreateIndexesOptions };

export const mongoCollections = {
  complaints: "complaints",
  loadState: "load_state"
} as const;

/**
 * - unique complaintId: re-extracting a window upserts instead of duplicating
 * - company + dateReceived: per-company date range reads
 */
export const mongoIndexes: { complaints: IndexPlan[] } = {
  complaints: [
    { keys: { complaintId: 1 }, options: { unique: true } },
    { keys: { company: 1, dateReceived: 1 }, options: {} }
  ]
};
