export type Env = {
  MONGO_URI: string;
  MONGO_DB: string;
  MIGRATE_COMMAND: string;
  MIGRATE_STATUS_COMMAND: string;
};

const validateMongoUri = (name: string, value: string): string => {
  if (!/^mongodb(\+srv)?:\/\/\S+$/.test(value)) {
    throw new Error(`${name} must be a mongodb:// or mongodb+srv:// connection string. Received: ${value}`);
  }
  return value;
};

const nonEmptyOr = (value: string | undefined, fallback: string): string =>
  value != null && value.trim() !== "" ? value.trim() : fallback;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = validateMongoUri("MONGO_URI", nonEmptyOr(env.MONGO_URI, "mongodb://localhost:27017/json_import"));
  const MONGO_DB = nonEmptyOr(env.MONGO_DB, "json_import");
  const MIGRATE_COMMAND = nonEmptyOr(env.MIGRATE_COMMAND, "drush migrate:import");
  const MIGRATE_STATUS_COMMAND = nonEmptyOr(env.MIGRATE_STATUS_COMMAND, "drush migrate:status");

  return { MONGO_URI, MONGO_DB, MIGRATE_COMMAND, MIGRATE_STATUS_COMMAND };
};
