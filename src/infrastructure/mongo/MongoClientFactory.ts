import { type Db, MongoClient } from "mongodb";

export type MongoConnection = {
  db: Db;
  close: () => Promise<void>;
};

/**
 * Connects once per scheduler tick. Server selection is bounded so an unreachable
 * database fails the tick instead of hanging until the lock would expire.
 */
export const connectMongo = async (
  mongoUri: string,
  dbName: string,
  serverSelectionTimeoutMS = 10000
): Promise<MongoConnection> => {
  const client = new MongoClient(mongoUri, { serverSelectionTimeoutMS });
  await client.connect();
  return {
    db: client.db(dbName),
    close: () => client.close()
  };
};
