/**
 * Folder enumeration over a paginated listing.
 */
import type { ListPage, StorageBackend } from "../storage/backend.js";
import { EnumerationFault, errorMessage } from "./exceptions.js";
import { classify } from "./paths.js";
import type { ProgressLog } from "./progress.js";
import type { FolderSummary } from "./types.js";

export interface EnumerationResult {
  /** Eligible file paths in listing order, without duplicates. */
  paths: string[];
  /** File paths whose extension is not allow-listed. */
  invalid: string[];
  fault: EnumerationFault | null;
}

async function* pages(
  storage: StorageBackend,
  folderPath: string,
  recursive: boolean,
): AsyncGenerator<ListPage> {
  let page = await storage.listFolder(folderPath, {
    recursive,
    includeDeleted: false,
  });
  yield page;

  while (page.hasMore) {
    page = await storage.listFolderContinue(page.cursor);
    yield page;
  }
}

/**
 * List `folderPath` recursively and split its files into eligible and invalid
 * paths. A listing fault stops enumeration; what was gathered is returned.
 */
export async function enumerateFolder(
  storage: StorageBackend,
  folderPath: string,
  log: ProgressLog,
): Promise<EnumerationResult> {
  const seen = new Set<string>();
  const paths: string[] = [];
  const invalid: string[] = [];
  let pageCount = 0;

  try {
    for await (const page of pages(storage, folderPath, true)) {
      pageCount++;
      log.debug(
        `Listed page ${pageCount} of ${folderPath || "/"} (${page.entries.length} entries)`,
        { kind: "folder", path: folderPath },
      );

      for (const entry of page.entries) {
        if (entry.type !== "file") continue;
        if (seen.has(entry.path)) continue;
        seen.add(entry.path);

        if (classify(entry.name).eligible) {
          paths.push(entry.pathDisplay);
        } else {
          invalid.push(entry.pathDisplay);
        }
      }
    }
  } catch (err) {
    const fault = new EnumerationFault(folderPath, errorMessage(err), {
      cause: err,
    });
    log.warning(fault.message, { kind: "folder", path: folderPath });
    return { paths, invalid, fault };
  }

  log.info(
    `Found ${paths.length} eligible and ${invalid.length} invalid file(s) in ${folderPath || "/"}`,
    { kind: "folder", path: folderPath },
  );
  return { paths, invalid, fault: null };
}

/** Immediate subfolders of `path` (non-recursive), for folder pickers. */
export async function listFolders(
  storage: StorageBackend,
  path = "",
): Promise<FolderSummary[]> {
  const folders: FolderSummary[] = [];
  try {
    for await (const page of pages(storage, path, false)) {
      for (const entry of page.entries) {
        if (entry.type !== "folder") continue;
        folders.push(
          entry.id === undefined
            ? { name: entry.name, path: entry.pathDisplay }
            : { id: entry.id, name: entry.name, path: entry.pathDisplay },
        );
      }
    }
  } catch (err) {
    throw new EnumerationFault(path, errorMessage(err), { cause: err });
  }
  return folders;
}
