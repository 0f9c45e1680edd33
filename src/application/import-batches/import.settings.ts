export type ImportSettings = {
  enabled: boolean;
  backupEnabled: boolean;
  backupLimit: number;
};

export type ImportSettingsInput = Partial<ImportSettings>;

export type ImportPaths = {
  sourceRoot: string;
  stagingDir: string;
  backupRoot: string;
};

export const defaultImportSettings: ImportSettings = {
  enabled: false,
  backupEnabled: false,
  backupLimit: 15
};

export const importSettingsCaps = {
  backupLimit: { min: 0, max: 1000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateImportSettings = (settings: ImportSettings): ImportSettings => {
  assertIntegerInRange(
    "backupLimit",
    settings.backupLimit,
    importSettingsCaps.backupLimit.min,
    importSettingsCaps.backupLimit.max
  );
  return settings;
};

/**
 * Settings are resolved once and frozen; nothing re-reads configuration mid-run.
 */
export const resolveImportSettings = (input: ImportSettingsInput = {}): Readonly<ImportSettings> =>
  Object.freeze(
    validateImportSettings({
      ...defaultImportSettings,
      ...input
    })
  );
