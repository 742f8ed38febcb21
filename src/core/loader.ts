/**
 * Batch loading: target → ordered paths → per-file download and extraction.
 *
 * Files are processed one at a time. A failing file is recorded and skipped;
 * it never stops the rest of the batch.
 */
import {
  EXTRACTOR_REGISTRY,
  getExtractorConfig,
  type ExtractorConfig,
  type ExtractorRegistry,
} from "../extractors/registry.js";
import type { StorageBackend } from "../storage/backend.js";
import { extractFile } from "./dispatch.js";
import { enumerateFolder } from "./enumerate.js";
import { ContentFault, FileFault, errorMessage } from "./exceptions.js";
import { classify, fileName, locate } from "./paths.js";
import type { ProgressLog } from "./progress.js";
import { withTempSlot, type TempSlot } from "./tempfile.js";
import type { ExtractedRecord, LoadRequest, LoadTarget } from "./types.js";

export interface BatchOptions {
  /** Parent directory for per-file temp slots (defaults to the OS temp dir). */
  tempDir?: string;
  registry?: ExtractorRegistry;
}

export type FileOutcome =
  | { status: "loaded"; path: string; records: ExtractedRecord[] }
  | { status: "invalid"; path: string }
  | { status: "failed"; path: string; fault: FileFault | ContentFault };

export interface BatchResult {
  records: ExtractedRecord[];
  invalidFiles: string[];
  outcomes: FileOutcome[];
}

/** Pick the active target. A folder wins over a list, a list over a single file. */
export function resolveTarget(
  request: Pick<LoadRequest, "folderPath" | "filePaths" | "filePath">,
): LoadTarget | null {
  if (request.folderPath != null) {
    return { mode: "folder", path: request.folderPath };
  }
  if (request.filePaths != null) {
    return { mode: "files", paths: [...request.filePaths] };
  }
  if (request.filePath != null) {
    return { mode: "file", path: request.filePath };
  }
  return null;
}

async function fetchInto(
  slot: TempSlot,
  storage: StorageBackend,
  path: string,
  config: ExtractorConfig,
): Promise<FileFault | null> {
  try {
    const data = config.exportFormat
      ? await storage.export(path, config.exportFormat)
      : await storage.download(path);
    await slot.write(data);
    return null;
  } catch (err) {
    return new FileFault(path, errorMessage(err), { cause: err });
  }
}

/** Download, stage and extract one file. */
export async function loadFile(
  storage: StorageBackend,
  path: string,
  log: ProgressLog,
  options: BatchOptions = {},
): Promise<FileOutcome> {
  const context = { kind: "file", path } as const;
  const { kind, extension } = classify(path);

  if (kind === null) {
    log.info(
      extension
        ? `Skipping ${path}: .${extension} files are not supported`
        : `Skipping ${path}: no file extension`,
      context,
    );
    return { status: "invalid", path };
  }

  const registry = options.registry ?? EXTRACTOR_REGISTRY;
  const config = getExtractorConfig(kind, registry);
  const source = locate(path);

  try {
    return await withTempSlot(
      fileName(path),
      async (slot): Promise<FileOutcome> => {
        log.debug(
          config.exportFormat
            ? `Exporting ${path} as ${config.exportFormat}`
            : `Downloading ${path}`,
          context,
        );
        const fault = await fetchInto(slot, storage, path, config);
        if (fault) {
          log.warning(fault.message, context);
          return { status: "failed", path, fault };
        }

        const extraction = await extractFile(kind, slot.path, path, source, log, registry);
        if (extraction.status === "failed") {
          return { status: "failed", path, fault: extraction.fault };
        }
        return { status: "loaded", path, records: extraction.records };
      },
      options.tempDir,
    );
  } catch (err) {
    // temp slot could not be created or released
    const fault = new FileFault(path, errorMessage(err), { cause: err });
    log.warning(fault.message, context);
    return { status: "failed", path, fault };
  }
}

async function resolvePaths(
  storage: StorageBackend,
  target: LoadTarget,
  log: ProgressLog,
): Promise<{ paths: string[]; invalid: string[] }> {
  switch (target.mode) {
    case "folder":
      return enumerateFolder(storage, target.path, log);
    case "files":
      return { paths: target.paths, invalid: [] };
    case "file":
      return { paths: [target.path], invalid: [] };
  }
}

/** Resolve `target` to paths and load each in order. */
export async function loadTarget(
  storage: StorageBackend,
  target: LoadTarget,
  log: ProgressLog,
  options: BatchOptions = {},
): Promise<BatchResult> {
  const { paths, invalid } = await resolvePaths(storage, target, log);
  const invalidFiles = [...invalid];
  const records: ExtractedRecord[] = [];
  const outcomes: FileOutcome[] = [];
  let loaded = 0;
  let failed = 0;

  for (const path of paths) {
    const outcome = await loadFile(storage, path, log, options);
    outcomes.push(outcome);
    switch (outcome.status) {
      case "loaded":
        loaded++;
        records.push(...outcome.records);
        break;
      case "invalid":
        invalidFiles.push(outcome.path);
        break;
      case "failed":
        failed++;
        break;
    }
  }

  log.info(
    `Loaded ${records.length} record(s) from ${loaded} file(s); ${failed} failed, ${invalidFiles.length} invalid`,
  );

  return { records, invalidFiles, outcomes };
}
