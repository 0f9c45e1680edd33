import { resolve } from "path";
import {
  defaultImportSettings,
  type ImportPaths,
  type ImportSettings,
  importSettingsCaps,
  resolveImportSettings
} from "../../application/import-batches/import.settings";

export type RuntimeConfig = {
  settings: Readonly<ImportSettings>;
  paths: ImportPaths;
};

export const defaultImportPaths = {
  sourceRoot: "data/json_import/json",
  stagingDir: "data/json_import",
  backupRoot: "data/json_import/backup"
} as const;

const trueValues = new Set(["1", "true", "yes"]);
const falseValues = new Set(["0", "false", "no"]);

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const normalized = raw.trim().toLowerCase();
  if (trueValues.has(normalized)) return true;
  if (falseValues.has(normalized)) return false;
  throw new Error(`${name}=${raw} is not a valid boolean`);
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const resolvePath = (env: NodeJS.ProcessEnv, name: string, fallback: string, cwd: string): string => {
  const raw = env[name];
  return resolve(cwd, raw != null && raw.trim() !== "" ? raw.trim() : fallback);
};

export const loadRuntimeConfigFromEnv = (
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): RuntimeConfig => {
  const settings = resolveImportSettings({
    enabled: parseOptionalBoolean(env, "IMPORT_ENABLED") ?? defaultImportSettings.enabled,
    backupEnabled: parseOptionalBoolean(env, "IMPORT_BACKUP_JSON") ?? defaultImportSettings.backupEnabled,
    backupLimit:
      parseOptionalIntInRange(env, "IMPORT_BACKUP_LIMIT", importSettingsCaps.backupLimit) ??
      defaultImportSettings.backupLimit
  });

  const paths: ImportPaths = {
    sourceRoot: resolvePath(env, "IMPORT_SOURCE_DIR", defaultImportPaths.sourceRoot, cwd),
    stagingDir: resolvePath(env, "IMPORT_STAGING_DIR", defaultImportPaths.stagingDir, cwd),
    backupRoot: resolvePath(env, "IMPORT_BACKUP_DIR", defaultImportPaths.backupRoot, cwd)
  };

  return { settings, paths };
};
