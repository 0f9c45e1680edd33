export type ImportErrorKind = "staging_io" | "transform_engine" | "archival_io";
export type ImportRefusalKind = "lock_unavailable" | "migrations_not_idle";
export type ImportSkipReason = "disabled" | "interactive_context";

export type ImportStep = "scan" | "copy" | "import" | "archive" | "delete" | "prune";

export type ImportErrorContext = {
  batchDir: string;
  step: ImportStep;
  file?: string;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const kindByStep: Record<ImportStep, ImportErrorKind> = {
  scan: "staging_io",
  copy: "staging_io",
  import: "transform_engine",
  archive: "archival_io",
  delete: "archival_io",
  prune: "archival_io"
};

export class BatchImportError extends Error {
  readonly code: ImportErrorKind;
  readonly context: ImportErrorContext;

  constructor(args: { code: ImportErrorKind; message: string; context: ImportErrorContext; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "BatchImportError";
    this.code = args.code;
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Wraps a failure raised while working on a batch, tagging it with the step it came from.
 */
export const wrapStepFailure = (reason: unknown, context: ImportErrorContext): BatchImportError => {
  if (reason instanceof BatchImportError) return reason;

  const where = context.file ? `${context.step} of ${context.file}` : context.step;
  return new BatchImportError({
    code: kindByStep[context.step],
    message: `Batch ${context.batchDir} failed during ${where}: ${toErrorMessage(reason)}`,
    context,
    cause: reason
  });
};

export type BatchImportOutcome =
  | {
      status: "imported";
      batchDir: string;
      files: string[];
      archivedTo: string;
      prunedBackups: string[];
      /** Set when retention could not be enforced after the batch was archived. */
      pruneError?: string;
    }
  | {
      status: "deleted";
      batchDir: string;
      files: string[];
    }
  | {
      status: "empty";
      batchDir: string;
    }
  | {
      status: "skipped";
      batchDir: string;
      reason: ImportSkipReason;
    }
  | {
      status: "failed";
      batchDir: string;
      kind: ImportErrorKind;
      message: string;
    };

export type BatchImportStatus = BatchImportOutcome["status"];
export type FailedBatchOutcome = Extract<BatchImportOutcome, { status: "failed" }>;

export const toFailedOutcome = (batchDir: string, reason: unknown): FailedBatchOutcome => {
  const error =
    reason instanceof BatchImportError
      ? reason
      : wrapStepFailure(reason, { batchDir, step: "import" });
  return {
    status: "failed",
    batchDir,
    kind: error.code,
    message: error.message
  };
};

export type ImportSessionSummary =
  | { status: ImportRefusalKind }
  | { status: "completed"; batches: BatchImportOutcome[] };

export const countOutcomesByStatus = (
  outcomes: BatchImportOutcome[]
): Partial<Record<BatchImportStatus, number>> => {
  const counts: Partial<Record<BatchImportStatus, number>> = {};
  for (const outcome of outcomes) {
    counts[outcome.status] = (counts[outcome.status] ?? 0) + 1;
  }
  return counts;
};
