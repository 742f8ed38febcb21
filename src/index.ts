/**
 * dropbox-doc-loader – turns Dropbox files into normalized text records.
 */
import { parseConfig, type LoaderSettings } from "./config.js";
import { listFolders } from "./core/enumerate.js";
import { SessionFault, errorMessage } from "./core/exceptions.js";
import { loadTarget, resolveTarget } from "./core/loader.js";
import { ProgressLog, type ProgressSink } from "./core/progress.js";
import {
  parseCredentials,
  resolveSessions,
  selectSession,
  type SelectedSession,
} from "./core/session.js";
import type {
  ExtractedRecord,
  FolderSummary,
  LoadRequest,
  LoadResult,
  LoadTarget,
} from "./core/types.js";
import type { ExtractorRegistry } from "./extractors/registry.js";
import type { SessionFactory } from "./storage/backend.js";

export * from "./core/types.js";
export * from "./core/exceptions.js";
export { ALLOWED_EXTENSIONS, classify, locate } from "./core/paths.js";
export {
  ProgressLog,
  getDetails,
  isCleanResult,
  type ProgressDetails,
  type ProgressSink,
} from "./core/progress.js";
export { parseCredentials, type AuthPayload } from "./core/session.js";
export { ConfigSchema, parseConfig, type Config } from "./config.js";
export type * from "./storage/backend.js";
export { DropboxSessionFactory, DropboxStorage } from "./storage/dropbox.js";
export { DiskSessionFactory, DiskStorage } from "./storage/disk.js";
export { EXTRACTOR_REGISTRY, type ExtractorRegistry } from "./extractors/registry.js";
export type { ExtractedSegment, TextExtractor } from "./extractors/types.js";

export interface LoaderOptions extends LoaderSettings {
  /** Receives each progress entry as it is recorded. */
  onProgress?: ProgressSink;
  registry?: ExtractorRegistry;
}

export interface ListFoldersRequest {
  auth: unknown;
  appKey?: string;
  appSecret?: string;
  teamFolder?: boolean;
  /** Folder whose children are listed; `""` is the namespace root. */
  path?: string;
}

function describeTarget(target: LoadTarget): string {
  switch (target.mode) {
    case "folder":
      return `folder ${target.path || "/"}`;
    case "files":
      return `${target.paths.length} file(s)`;
    case "file":
      return `file ${target.path}`;
  }
}

export class DropboxLoader {
  private sessions: SessionFactory;
  private options: LoaderOptions;

  constructor(sessions: SessionFactory, options: LoaderOptions = {}) {
    this.sessions = sessions;
    this.options = options;
  }

  /** Construct from a configuration object (validated with Zod). */
  static fromConfig(
    config: unknown,
    options: Omit<LoaderOptions, keyof LoaderSettings> = {},
  ): DropboxLoader {
    const { sessions, settings } = parseConfig(config);
    return new DropboxLoader(sessions, { ...settings, ...options });
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /**
   * Load every eligible file of the request's target.
   *
   * Each call returns its own result. Only a session failure ends the call
   * early; every other failure is in `errors` and the rest of the batch is
   * still loaded.
   */
  async load(request: LoadRequest): Promise<LoadResult> {
    const log = new ProgressLog(this.options.onProgress);
    const finish = (
      records: ExtractedRecord[],
      invalidFiles: string[],
    ): LoadResult => ({
      records,
      invalidFiles,
      errors: [...log.errors],
      progress: [...log.entries],
    });

    const target = resolveTarget(request);
    if (target === null) {
      log.warning("Nothing to load: no folder path, file paths or file path given");
      return finish([], []);
    }
    const supplied = [request.folderPath, request.filePaths, request.filePath];
    if (supplied.filter((t) => t != null).length > 1) {
      log.info(`Several targets given; loading the ${target.mode} target only`);
    }

    let session: SelectedSession;
    try {
      session = await this.openSession(request);
    } catch (err) {
      const fault =
        err instanceof SessionFault
          ? err
          : new SessionFault(errorMessage(err), { cause: err });
      log.warning(fault.message);
      return finish([], []);
    }

    log.info(`Loading ${describeTarget(target)} with the ${session.scope.kind} session`);
    const batch = await loadTarget(session.storage, target, log, {
      tempDir: this.options.tempDir,
      registry: this.options.registry,
    });
    return finish(batch.records, batch.invalidFiles);
  }

  /**
   * Immediate subfolders of `request.path` (default: the root), for folder
   * pickers. Rejects with SessionFault or EnumerationFault.
   */
  async listFolders(request: ListFoldersRequest): Promise<FolderSummary[]> {
    const session = await this.openSession(request);
    return listFolders(session.storage, request.path ?? "");
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private async openSession(request: {
    auth: unknown;
    appKey?: string;
    appSecret?: string;
    teamFolder?: boolean;
  }): Promise<SelectedSession> {
    const credentials = parseCredentials(
      request.auth,
      request.appKey,
      request.appSecret,
    );
    const sessions = await resolveSessions(
      this.sessions,
      credentials,
      this.options.timeoutMs,
    );
    return selectSession(sessions, request.teamFolder ?? false);
  }
}
