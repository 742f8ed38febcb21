/**
 * Per-call deadline for storage sessions.
 *
 * The underlying request is not cancelled; the caller just stops waiting.
 */
import { DeadlineExceededError } from "../core/exceptions.js";
import type {
  AccountInfo,
  ListOptions,
  ListPage,
  StorageBackend,
} from "./backend.js";

export async function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  work: () => Promise<T>,
): Promise<T> {
  let timeout: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timeout = setTimeout(
      () => reject(new DeadlineExceededError(operation, timeoutMs)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([work(), expired]);
  } finally {
    clearTimeout(timeout);
  }
}

export class TimedStorage implements StorageBackend {
  private inner: StorageBackend;
  private timeoutMs: number;

  constructor(inner: StorageBackend, timeoutMs: number) {
    this.inner = inner;
    this.timeoutMs = timeoutMs;
  }

  listFolder(path: string, options: ListOptions): Promise<ListPage> {
    return withDeadline(`list_folder ${path || "/"}`, this.timeoutMs, () =>
      this.inner.listFolder(path, options),
    );
  }

  listFolderContinue(cursor: string): Promise<ListPage> {
    return withDeadline("list_folder/continue", this.timeoutMs, () =>
      this.inner.listFolderContinue(cursor),
    );
  }

  download(path: string): Promise<Uint8Array> {
    return withDeadline(`download ${path}`, this.timeoutMs, () =>
      this.inner.download(path),
    );
  }

  export(path: string, format: string): Promise<Uint8Array> {
    return withDeadline(`export ${path}`, this.timeoutMs, () =>
      this.inner.export(path, format),
    );
  }

  whoami(): Promise<AccountInfo> {
    return withDeadline("whoami", this.timeoutMs, () => this.inner.whoami());
  }
}
