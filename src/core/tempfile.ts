/**
 * Scoped temporary storage for one downloaded file.
 */
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export interface TempSlot {
  /** Local path the file is staged at. */
  readonly path: string;
  write(data: Uint8Array): Promise<void>;
}

/**
 * Run `fn` with a private temp directory holding `fileName`; the directory is
 * removed when `fn` settles, whether it resolved or threw.
 */
export async function withTempSlot<T>(
  fileName: string,
  fn: (slot: TempSlot) => Promise<T>,
  baseDir: string = tmpdir(),
): Promise<T> {
  const dir = await mkdtemp(join(baseDir, "dropbox-loader-"));
  const path = join(dir, fileName || "download");
  const slot: TempSlot = {
    path,
    write: (data) => writeFile(path, data),
  };

  try {
    return await fn(slot);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
