import type { ComplaintDoc } from "../core/complaint/complaint.types";

export type { ComplaintDoc };

export type UpsertResult = { upserted: number; modified: number };

export interface ComplaintRepository {
  upsertMany(docs: ComplaintDoc[]): Promise<UpsertResult>;
}
