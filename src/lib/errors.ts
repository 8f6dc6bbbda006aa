/**
 * Error taxonomy for the scan pipeline
 *
 * - ResolutionError: the batch source produced no identifiers (fatal for the run)
 * - FetchError: metadata or download failure (retry list; fatal in single mode)
 * - DecodeError: the codec produced no samples (identifier abandoned)
 * - LedgerWriteError: an append could not be made durable (always fatal)
 */

export class ResolutionError extends Error {
  readonly name = "ResolutionError";

  constructor(
    message: string,
    readonly source: string,
  ) {
    super(message);
  }
}

export class FetchError extends Error {
  readonly name = "FetchError";

  constructor(
    message: string,
    readonly reference: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class DecodeError extends Error {
  readonly name = "DecodeError";

  constructor(
    message: string,
    readonly assetPath: string,
  ) {
    super(message);
  }
}

export class LedgerWriteError extends Error {
  readonly name = "LedgerWriteError";

  constructor(
    message: string,
    readonly ledgerPath: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
