import type { MongoClient } from "mongodb";
import { createComplaintLoader } from "../application/extract-complaints/extractComplaints.usecase";
import { runIncrementalLoad } from "../application/incremental-load/runIncrementalLoad.usecase";
import type { RunSummary } from "../application/incremental-load/run.summary";
import { WatermarkStore } from "../core/watermark/WatermarkStore";
import { CfpbHttpClient } from "../infrastructure/cfpb/CfpbHttpClient";
import { createMongoClient } from "../infrastructure/mongo/MongoClientFactory";
import { MongoComplaintRepository } from "../infrastructure/mongo/MongoComplaintRepository";
import { MongoWatermarkStorage } from "../infrastructure/mongo/MongoWatermarkStorage";
import { FileWatermarkStorage } from "../infrastructure/state/FileWatermarkStorage";
import type { WatermarkStorage } from "../ports/WatermarkStorage";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import type { IsoDate } from "../shared/dates/calendarDate";

const createWatermarkStorage = (env: Env, mongo: MongoClient | undefined): WatermarkStorage => {
  if (env.STATE_BACKEND === "mongo" && mongo) {
    return new MongoWatermarkStorage(mongo, env.MONGO_DB_NAME);
  }
  return new FileWatermarkStorage(env.STATE_FILE);
};

export const runLoad = async (options: { today?: IsoDate } = {}): Promise<RunSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();

  const mongo = await createMongoClient(env.MONGO_URI);
  try {
    const client = new CfpbHttpClient(env.CFPB_BASE_URL, runtime.timeoutMs);
    const repo = new MongoComplaintRepository(mongo, env.MONGO_DB_NAME);

    return await runIncrementalLoad({
      watermarkStore: new WatermarkStore(createWatermarkStorage(env, mongo)),
      loader: createComplaintLoader({ client, repo, config: runtime.extractorConfig }),
      companies: runtime.companies,
      startDate: runtime.startDate,
      concurrency: runtime.concurrency,
      today: options.today
    });
  } finally {
    await mongo.close();
  }
};

const withWatermarkStore = async <T>(fn: (store: WatermarkStore) => Promise<T>): Promise<T> => {
  const env = loadEnv();
  if (env.STATE_BACKEND === "file") {
    return fn(new WatermarkStore(createWatermarkStorage(env, undefined)));
  }

  const mongo = await createMongoClient(env.MONGO_URI);
  try {
    return await fn(new WatermarkStore(createWatermarkStorage(env, mongo)));
  } finally {
    await mongo.close();
  }
};

export const readLoadState = (): Promise<IsoDate | undefined> =>
  withWatermarkStore((store) => store.getLastLoadedDate());

export const resetLoadState = (): Promise<void> => withWatermarkStore((store) => store.resetState());
