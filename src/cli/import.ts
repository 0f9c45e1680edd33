#!/usr/bin/env node
import { runImport } from "../composition/root";

type CliErrorEnvelope = {
  event: "import.failed";
  name: string;
  message: string;
  code?: string | number;
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "import.failed",
    name: error.name || "Error",
    message: error.message
  };

  // Mongo driver errors carry numeric codes, ours carry strings.
  if (typeof errorRecord.code === "string" || (typeof errorRecord.code === "number" && Number.isFinite(errorRecord.code))) {
    envelope.code = errorRecord.code;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

/**
 * Entry point for the scheduler (cron): one import session per invocation.
 * Lock and health refusals are normal outcomes and exit 0.
 */
export const executeImportCli = async (): Promise<void> => {
  try {
    await runImport("batch");
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeImportCli();
}
