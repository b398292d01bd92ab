import type { Collection, MongoClient } from "mongodb";
import type { WatermarkStorage } from "../../ports/WatermarkStorage";
import { mongoCollections } from "./mongo.indexes";

type LoadStateDoc = {
  _id: string;
  lastLoadedDate: string;
  updatedAt: Date;
};

/**
 * Watermark kept as one document per key; single-document writes are atomic in MongoDB.
 */
export class MongoWatermarkStorage implements WatermarkStorage {
  constructor(
    private readonly client: MongoClient,
    private readonly dbName = "cfpb",
    private readonly key = "cfpb_complaints",
    private readonly now: () => Date = () => new Date()
  ) {}

  private collection(): Collection<LoadStateDoc> {
    return this.client.db(this.dbName).collection<LoadStateDoc>(mongoCollections.loadState);
  }

  async read(): Promise<string | undefined> {
    const doc = await this.collection().findOne({ _id: this.key });
    return doc?.lastLoadedDate;
  }

  async write(value: string): Promise<void> {
    await this.collection().replaceOne(
      { _id: this.key },
      { lastLoadedDate: value, updatedAt: this.now() },
      { upsert: true }
    );
  }

  async clear(): Promise<void> {
    await this.collection().deleteOne({ _id: this.key });
  }
}
