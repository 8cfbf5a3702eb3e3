// ── Error taxonomy ───────────────────────────────────

export type DaybookErrorCode =
  | "config_validation"
  | "task_validation"
  | "index_out_of_range"
  | "storage_io";

export abstract class DaybookError extends Error {
  abstract readonly code: DaybookErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unknown setting key, or a value outside the key's domain. */
export class ConfigValidationError extends DaybookError {
  readonly code = "config_validation";

  constructor(
    readonly key: string,
    message: string,
  ) {
    super(message);
  }
}

export class TaskValidationError extends DaybookError {
  readonly code = "task_validation";

  constructor(
    readonly field: string,
    readonly reason: string,
  ) {
    super(`Invalid ${field}: ${reason}`);
  }
}

/**
 * Edit/delete referenced a row that does not exist. Indices shift after every
 * insertion or deletion, so callers re-fetch the collection and retry.
 */
export class IndexOutOfRangeError extends DaybookError {
  readonly code = "index_out_of_range";

  constructor(
    readonly index: number,
    readonly size: number,
  ) {
    super(
      size === 0
        ? `No task at index ${index}: the collection is empty`
        : `No task at index ${index}: valid range is 0..${size - 1}`,
    );
  }
}

export class StorageIOError extends DaybookError {
  readonly code = "storage_io";

  constructor(
    readonly path: string,
    message: string,
    cause?: unknown,
  ) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, { cause });
  }
}

// ── Non-fatal load/import diagnostics ────────────────

export interface RowParseWarning {
  kind: "row" | "external-change" | "checksum";
  /** File the warning refers to */
  source: string;
  /** 1-based data row (header excluded) */
  row?: number;
  message: string;
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
