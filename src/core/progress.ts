/**
 * Append-only progress trail for one load.
 */
import {
  Severity,
  type ErrorContext,
  type ErrorRecord,
  type LoadResult,
  type LogEntry,
} from "./types.js";

export type ProgressSink = (entry: LogEntry) => void;

const SEVERITY_RANK: Record<Severity, number> = {
  [Severity.Debug]: 0,
  [Severity.Info]: 1,
  [Severity.Warning]: 2,
};

export interface ProgressDetails {
  progress: LogEntry[];
  errors: ErrorRecord[];
}

/** Entries at or above `level`. */
export function filterBySeverity(
  entries: readonly LogEntry[],
  level: Severity,
): LogEntry[] {
  const min = SEVERITY_RANK[level];
  return entries.filter((e) => SEVERITY_RANK[e.severity] >= min);
}

export class ProgressLog {
  private readonly trail: LogEntry[] = [];
  private readonly errorRecords: ErrorRecord[] = [];
  private readonly sink: ProgressSink | null;

  constructor(sink?: ProgressSink) {
    this.sink = sink ?? null;
  }

  /** Append an entry; WARNING entries also become error records. */
  log(message: string, severity: Severity, context?: ErrorContext): void {
    const entry: LogEntry = context
      ? { message, severity, context }
      : { message, severity };
    this.trail.push(entry);

    if (severity === Severity.Warning) {
      this.errorRecords.push(context ? { message, context } : { message });
    }

    this.sink?.(entry);
  }

  debug(message: string, context?: ErrorContext): void {
    this.log(message, Severity.Debug, context);
  }

  info(message: string, context?: ErrorContext): void {
    this.log(message, Severity.Info, context);
  }

  warning(message: string, context?: ErrorContext): void {
    this.log(message, Severity.Warning, context);
  }

  get entries(): readonly LogEntry[] {
    return this.trail;
  }

  get errors(): readonly ErrorRecord[] {
    return this.errorRecords;
  }

  details(level: Severity): ProgressDetails {
    return {
      progress: filterBySeverity(this.trail, level),
      errors: [...this.errorRecords],
    };
  }
}

/** Severity-filtered progress plus errors of a finished load. */
export function getDetails(result: LoadResult, level: Severity): ProgressDetails {
  return {
    progress: filterBySeverity(result.progress, level),
    errors: [...result.errors],
  };
}

/** The only fully successful outcome: records produced and nothing failed. */
export function isCleanResult(result: LoadResult): boolean {
  return result.errors.length === 0 && result.records.length > 0;
}
