import type { AnyBulkWriteOperation, Collection, MongoClient } from "mongodb";
import type { ComplaintDoc, ComplaintRepository, UpsertResult } from "../../ports/ComplaintRepository";
import { mongoCollections, mongoIndexes } from "./mongo.indexes";

export const dedupeComplaintDocsById = (docs: ComplaintDoc[]): ComplaintDoc[] => {
  const byComplaintId = new Map<string, ComplaintDoc>();
  for (const doc of docs) {
    byComplaintId.set(doc.complaintId, doc);
  }
  return Array.from(byComplaintId.values());
};

export const toUpsertOperation = (doc: ComplaintDoc): AnyBulkWriteOperation<ComplaintDoc> => {
  const { _id, complaintId, ...fields } = doc;
  return {
    updateOne: {
      filter: { complaintId },
      update: {
        $setOnInsert: { _id, complaintId },
        $set: fields
      },
      upsert: true
    }
  };
};

/**
 * Bulk upsert keyed on `complaintId`, so loading the same window twice is a no-op
 * apart from refreshed fields.
 */
export class MongoComplaintRepository implements ComplaintRepository {
  private collection?: Collection<ComplaintDoc>;

  constructor(
    private readonly client: MongoClient,
    private readonly dbName = "cfpb",
    private readonly collectionName: string = mongoCollections.complaints
  ) {}

  private async getCollection(): Promise<Collection<ComplaintDoc>> {
    if (this.collection) return this.collection;

    const col = this.client.db(this.dbName).collection<ComplaintDoc>(this.collectionName);
    for (const idx of mongoIndexes.complaints) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async upsertMany(docs: ComplaintDoc[]): Promise<UpsertResult> {
    if (docs.length === 0) {
      return { upserted: 0, modified: 0 };
    }

    const col = await this.getCollection();
    const res = await col.bulkWrite(dedupeComplaintDocsById(docs).map(toUpsertOperation), { ordered: false });
    return {
      upserted: res.upsertedCount ?? 0,
      modified: res.modifiedCount ?? 0
    };
  }
}
