/**
 * Fault types raised inside the loader.
 *
 * Only `SessionFault` ends a load early; the rest are caught at the layer that
 * produced them and recorded as errors.
 */

export class SessionFault extends Error {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(
      message ? `Session failed: ${message}` : "Session failed",
      options,
    );
    this.name = "SessionFault";
  }
}

export class EnumerationFault extends Error {
  folder: string;

  constructor(folder: string, message?: string, options?: { cause?: unknown }) {
    super(
      message
        ? `Listing folder "${folder}" failed: ${message}`
        : `Listing folder "${folder}" failed`,
      options,
    );
    this.name = "EnumerationFault";
    this.folder = folder;
  }
}

export class FileFault extends Error {
  file: string;

  constructor(file: string, message?: string, options?: { cause?: unknown }) {
    super(
      message
        ? `Loading "${file}" failed: ${message}`
        : `Loading "${file}" failed`,
      options,
    );
    this.name = "FileFault";
    this.file = file;
  }
}

export class ContentFault extends Error {
  file: string;

  constructor(file: string, message?: string, options?: { cause?: unknown }) {
    super(
      message
        ? `Extracting "${file}" failed: ${message}`
        : `Extracting "${file}" failed`,
      options,
    );
    this.name = "ContentFault";
    this.file = file;
  }
}

export class StorageRequestError extends Error {
  status: number | null;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "StorageRequestError";
    this.status = options?.status ?? null;
  }
}

export class DeadlineExceededError extends Error {
  timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "DeadlineExceededError";
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** Message text of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
