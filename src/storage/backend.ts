/**
 * Remote storage contracts.
 *
 * A `StorageBackend` is one authenticated session; a `SessionFactory` opens
 * sessions from credentials.
 */

export interface StorageEntry {
  type: "file" | "folder" | "deleted";
  name: string;
  /** Lower-cased path as reported by the API. */
  path: string;
  /** Path with the user's casing. */
  pathDisplay: string;
  id?: string;
}

export interface ListPage {
  entries: StorageEntry[];
  cursor: string;
  hasMore: boolean;
}

export interface ListOptions {
  recursive: boolean;
  includeDeleted: boolean;
}

export interface AccountInfo {
  accountId: string;
  rootNamespaceId: string;
}

export interface StorageBackend {
  /** First page of a folder listing. */
  listFolder(path: string, options: ListOptions): Promise<ListPage>;

  /** Next page of a listing. */
  listFolderContinue(cursor: string): Promise<ListPage>;

  /** Raw bytes of a file. */
  download(path: string): Promise<Uint8Array>;

  /** A file exported to another format (e.g. a Paper doc as markdown). */
  export(path: string, format: string): Promise<Uint8Array>;

  whoami(): Promise<AccountInfo>;
}

export interface Credentials {
  accessToken: string;
  refreshToken?: string;
  appKey?: string;
  appSecret?: string;
}

export type SessionScope =
  | { kind: "personal" }
  | { kind: "team"; namespaceId: string };

export interface SessionFactory {
  authenticate(
    credentials: Credentials,
    scope: SessionScope,
  ): Promise<StorageBackend>;
}
