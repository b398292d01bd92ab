import { MongoClient } from "mongodb";

/**
 * One connected client per run, shared by the complaint repository and the
 * Mongo watermark backend. The caller owns `close()`.
 */
export const createMongoClient = async (mongoUri: string): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, { appName: "cfpb-complaints-loader" });
  await client.connect();
  return client;
};
