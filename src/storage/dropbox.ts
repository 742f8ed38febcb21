/**
 * Dropbox storage backend using the official SDK.
 *
 * Team sessions are the same client with a `Dropbox-API-Path-Root` header
 * pointing at the account's root namespace.
 */
import { Dropbox, DropboxResponseError, type files } from "dropbox";
import { StorageRequestError } from "../core/exceptions.js";
import type {
  AccountInfo,
  Credentials,
  ListOptions,
  ListPage,
  SessionFactory,
  SessionScope,
  StorageBackend,
  StorageEntry,
} from "./backend.js";

type ListedEntry = files.ListFolderResult["entries"][number];

function toEntry(entry: ListedEntry): StorageEntry {
  const path = entry.path_lower ?? entry.path_display ?? `/${entry.name}`;
  const pathDisplay = entry.path_display ?? path;

  switch (entry[".tag"]) {
    case "file":
      return { type: "file", name: entry.name, path, pathDisplay, id: entry.id };
    case "folder":
      return { type: "folder", name: entry.name, path, pathDisplay, id: entry.id };
    case "deleted":
      return { type: "deleted", name: entry.name, path, pathDisplay };
  }
}

function toPage(result: files.ListFolderResult): ListPage {
  return {
    entries: result.entries.map(toEntry),
    cursor: result.cursor,
    hasMore: result.has_more,
  };
}

function summarize(body: unknown): string {
  if (typeof body === "string") return body;
  if (
    typeof body === "object" &&
    body !== null &&
    "error_summary" in body &&
    typeof body.error_summary === "string"
  ) {
    return body.error_summary;
  }
  return JSON.stringify(body);
}

function toStorageError(operation: string, err: unknown): StorageRequestError {
  if (err instanceof DropboxResponseError) {
    return new StorageRequestError(`${operation}: ${summarize(err.error)}`, {
      status: err.status,
      cause: err,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new StorageRequestError(`${operation}: ${message}`, { cause: err });
}

function binaryOf(operation: string, result: object): Uint8Array {
  // The SDK attaches the body as `fileBinary` under Node; it is not in the typings.
  if ("fileBinary" in result && Buffer.isBuffer(result.fileBinary)) {
    return result.fileBinary;
  }
  throw new StorageRequestError(`${operation}: response carried no file body`);
}

export class DropboxStorage implements StorageBackend {
  private client: Dropbox;

  constructor(credentials: Credentials, scope: SessionScope) {
    const canRefresh =
      credentials.refreshToken !== undefined &&
      credentials.appKey !== undefined &&
      credentials.appSecret !== undefined;

    this.client = new Dropbox({
      accessToken: credentials.accessToken,
      ...(canRefresh
        ? {
            refreshToken: credentials.refreshToken,
            clientId: credentials.appKey,
            clientSecret: credentials.appSecret,
          }
        : {}),
      ...(scope.kind === "team"
        ? {
            pathRoot: JSON.stringify({ ".tag": "root", root: scope.namespaceId }),
          }
        : {}),
    });
  }

  async listFolder(path: string, options: ListOptions): Promise<ListPage> {
    try {
      const response = await this.client.filesListFolder({
        path,
        recursive: options.recursive,
        include_deleted: options.includeDeleted,
      });
      return toPage(response.result);
    } catch (err) {
      throw toStorageError(`list_folder ${path || "/"}`, err);
    }
  }

  async listFolderContinue(cursor: string): Promise<ListPage> {
    try {
      const response = await this.client.filesListFolderContinue({ cursor });
      return toPage(response.result);
    } catch (err) {
      throw toStorageError("list_folder/continue", err);
    }
  }

  async download(path: string): Promise<Uint8Array> {
    let result: files.FileMetadata;
    try {
      result = (await this.client.filesDownload({ path })).result;
    } catch (err) {
      throw toStorageError(`download ${path}`, err);
    }
    return binaryOf(`download ${path}`, result);
  }

  async export(path: string, format: string): Promise<Uint8Array> {
    let result: files.ExportResult;
    try {
      result = (
        await this.client.filesExport({ path, export_format: format })
      ).result;
    } catch (err) {
      throw toStorageError(`export ${path}`, err);
    }
    return binaryOf(`export ${path}`, result);
  }

  async whoami(): Promise<AccountInfo> {
    try {
      const { result } = await this.client.usersGetCurrentAccount();
      return {
        accountId: result.account_id,
        rootNamespaceId: result.root_info.root_namespace_id,
      };
    } catch (err) {
      throw toStorageError("users/get_current_account", err);
    }
  }
}

export class DropboxSessionFactory implements SessionFactory {
  async authenticate(
    credentials: Credentials,
    scope: SessionScope,
  ): Promise<StorageBackend> {
    return new DropboxStorage(credentials, scope);
  }
}
