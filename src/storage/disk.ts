/**
 * Local filesystem storage backend.
 *
 * Serves a directory as a Dropbox-shaped namespace: display paths are
 * `/`-rooted, listings are paginated with an opaque cursor, and a `.paper`
 * file holds the markdown its export would produce.
 */
import type { Stats } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { join, posix, resolve, sep } from "node:path";
import { z } from "zod";
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

const LOCAL_NAMESPACE = "local";

const CursorSchema = z.object({
  path: z.string(),
  recursive: z.boolean(),
  offset: z.number().int().nonnegative(),
});

type Cursor = z.infer<typeof CursorSchema>;

function encodeCursor(cursor: Cursor): string {
  return Buffer.from(JSON.stringify(cursor)).toString("base64url");
}

function decodeCursor(raw: string): Cursor {
  try {
    return CursorSchema.parse(
      JSON.parse(Buffer.from(raw, "base64url").toString("utf8")),
    );
  } catch (err) {
    throw new StorageRequestError("list_folder/continue: invalid cursor", {
      status: 409,
      cause: err,
    });
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class DiskStorage implements StorageBackend {
  private basePath: string;
  private pageSize: number;

  constructor(basePath: string, pageSize = 100) {
    this.basePath = resolve(basePath);
    this.pageSize = pageSize;
  }

  private resolve(path: string): string {
    const full = resolve(join(this.basePath, path));
    if (full !== this.basePath && !full.startsWith(this.basePath + sep)) {
      throw new StorageRequestError(`path outside namespace: ${path}`, {
        status: 400,
      });
    }
    return full;
  }

  private async walk(path: string, recursive: boolean): Promise<StorageEntry[]> {
    const full = this.resolve(path);
    let info: Stats;
    try {
      info = await stat(full);
    } catch (err) {
      if (isNotFound(err)) {
        throw new StorageRequestError(`list_folder ${path || "/"}: path/not_found`, {
          status: 409,
          cause: err,
        });
      }
      throw err;
    }
    if (!info.isDirectory()) {
      throw new StorageRequestError(`list_folder ${path}: path/not_folder`, {
        status: 409,
      });
    }

    const entries: StorageEntry[] = [];
    const visit = async (dir: string, display: string): Promise<void> => {
      const children = await readdir(dir, { withFileTypes: true });
      children.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      for (const child of children) {
        const childDisplay = posix.join(display, child.name);
        if (child.isDirectory()) {
          entries.push(this.entry("folder", child.name, childDisplay));
          if (recursive) await visit(join(dir, child.name), childDisplay);
        } else if (child.isFile()) {
          entries.push(this.entry("file", child.name, childDisplay));
        }
      }
    };

    await visit(full, posix.join("/", path));
    return entries;
  }

  private entry(
    type: "file" | "folder",
    name: string,
    pathDisplay: string,
  ): StorageEntry {
    return { type, name, path: pathDisplay.toLowerCase(), pathDisplay };
  }

  private async page(cursor: Cursor): Promise<ListPage> {
    const all = await this.walk(cursor.path, cursor.recursive);
    const end = cursor.offset + this.pageSize;
    const hasMore = end < all.length;
    return {
      entries: all.slice(cursor.offset, end),
      cursor: encodeCursor({ ...cursor, offset: Math.min(end, all.length) }),
      hasMore,
    };
  }

  async listFolder(path: string, options: ListOptions): Promise<ListPage> {
    return this.page({ path, recursive: options.recursive, offset: 0 });
  }

  async listFolderContinue(cursor: string): Promise<ListPage> {
    return this.page(decodeCursor(cursor));
  }

  async download(path: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await readFile(this.resolve(path)));
    } catch (err) {
      if (isNotFound(err)) {
        throw new StorageRequestError(`download ${path}: path/not_found`, {
          status: 409,
          cause: err,
        });
      }
      throw err;
    }
  }

  async export(path: string, format: string): Promise<Uint8Array> {
    if (format !== "markdown") {
      throw new StorageRequestError(
        `export ${path}: unsupported export format ${format}`,
        { status: 409 },
      );
    }
    return this.download(path);
  }

  async whoami(): Promise<AccountInfo> {
    return { accountId: LOCAL_NAMESPACE, rootNamespaceId: LOCAL_NAMESPACE };
  }
}

/** Every scope of a local directory resolves to the same tree. */
export class DiskSessionFactory implements SessionFactory {
  private basePath: string;
  private pageSize: number;

  constructor(basePath: string, pageSize = 100) {
    this.basePath = basePath;
    this.pageSize = pageSize;
  }

  async authenticate(
    _credentials: Credentials,
    _scope: SessionScope,
  ): Promise<StorageBackend> {
    return new DiskStorage(this.basePath, this.pageSize);
  }
}
