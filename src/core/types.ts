/**
 * Loader data model.
 */

/** Closed set of file kinds the loader knows how to extract. */
export enum FileKind {
  Text = "text",
  Html = "html",
  Rtf = "rtf",
  Pdf = "pdf",
  Docx = "docx",
  Spreadsheet = "spreadsheet",
  Presentation = "presentation",
  Markdown = "markdown",
  Paper = "paper",
}

/** A normalized text record produced from one remote file (or one PDF page). */
export interface ExtractedRecord {
  content: string;
  source: string;
  kind: "file";
  page?: number;
}

export enum Severity {
  Debug = "DEBUG",
  Info = "INFO",
  Warning = "WARNING",
}

export interface ErrorContext {
  kind: "file" | "folder";
  path: string;
}

export interface ErrorRecord {
  message: string;
  context?: ErrorContext;
}

export interface LogEntry {
  message: string;
  severity: Severity;
  context?: ErrorContext;
}

/** Result of one `load` call. May be partial; check `errors`. */
export interface LoadResult {
  records: ExtractedRecord[];
  invalidFiles: string[];
  errors: ErrorRecord[];
  progress: LogEntry[];
}

/** Exactly one target mode, resolved from a request. */
export type LoadTarget =
  | { mode: "folder"; path: string }
  | { mode: "files"; paths: string[] }
  | { mode: "file"; path: string };

export interface LoadRequest {
  /** Token payload; `access_token` or the legacy `access` key. */
  auth: unknown;
  appKey?: string;
  appSecret?: string;
  /** Folder to enumerate recursively; `""` is the account root. */
  folderPath?: string;
  filePaths?: string[];
  filePath?: string;
  /** Load through the team (root namespace) session instead of the personal one. */
  teamFolder?: boolean;
}

export interface FolderSummary {
  id?: string;
  name: string;
  path: string;
}
