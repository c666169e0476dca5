import { MongoClient } from "mongodb";

export type MongoClientOptions = {
  serverSelectionTimeoutMS?: number;
};

export const createMongoClient = async (mongoUri: string, options: MongoClientOptions = {}): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, { serverSelectionTimeoutMS: options.serverSelectionTimeoutMS ?? 10_000 });
  await client.connect();
  return client;
};
