/**
 * Disk storage backend: listing, pagination, downloads and a full load over a
 * local tree.
 */
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { DropboxLoader } from "../src/index.js";
import { DiskStorage } from "../src/storage/disk.js";
import { makeTmpDir } from "./fixtures.js";

let base: string;

beforeEach(() => {
  base = makeTmpDir();
  writeFileSync(join(base, "notes.txt"), "Hello");
  writeFileSync(join(base, "tool.exe"), "MZ");
  mkdirSync(join(base, "web"));
  writeFileSync(join(base, "web", "page.html"), "<p>Hi <b>there</b></p>");
});

afterEach(() => {
  rmSync(base, { recursive: true, force: true });
});

describe("DiskStorage listing", () => {
  test("recursive listing in name order, paged by the cursor", async () => {
    const storage = new DiskStorage(base, 2);

    const first = await storage.listFolder("", { recursive: true, includeDeleted: false });
    expect(first.entries).toEqual([
      { type: "file", name: "notes.txt", path: "/notes.txt", pathDisplay: "/notes.txt" },
      { type: "file", name: "tool.exe", path: "/tool.exe", pathDisplay: "/tool.exe" },
    ]);
    expect(first.hasMore).toBe(true);

    const second = await storage.listFolderContinue(first.cursor);
    expect(second.entries).toEqual([
      { type: "folder", name: "web", path: "/web", pathDisplay: "/web" },
      { type: "file", name: "page.html", path: "/web/page.html", pathDisplay: "/web/page.html" },
    ]);
    expect(second.hasMore).toBe(false);
  });

  test("non-recursive listing stops at direct children", async () => {
    const storage = new DiskStorage(base);
    const page = await storage.listFolder("", { recursive: false, includeDeleted: false });
    expect(page.entries.map((e) => e.pathDisplay)).toEqual(["/notes.txt", "/tool.exe", "/web"]);
  });

  test("lower-cased path, display path keeps case", async () => {
    mkdirSync(join(base, "Docs"));
    writeFileSync(join(base, "Docs", "Report.TXT"), "r");
    const storage = new DiskStorage(base);

    const page = await storage.listFolder("/Docs", { recursive: true, includeDeleted: false });
    expect(page.entries).toEqual([
      { type: "file", name: "Report.TXT", path: "/docs/report.txt", pathDisplay: "/Docs/Report.TXT" },
    ]);
  });

  test("missing folders, files and bad cursors", async () => {
    const storage = new DiskStorage(base);
    const opts = { recursive: true, includeDeleted: false };

    await expect(storage.listFolder("/missing", opts)).rejects.toThrow(
      "list_folder /missing: path/not_found",
    );
    await expect(storage.listFolder("/notes.txt", opts)).rejects.toThrow(
      "list_folder /notes.txt: path/not_folder",
    );
    await expect(storage.listFolderContinue("garbage")).rejects.toThrow(
      "list_folder/continue: invalid cursor",
    );
  });
});

describe("DiskStorage files", () => {
  test("download returns the bytes", async () => {
    const storage = new DiskStorage(base);
    const data = await storage.download("/web/page.html");
    expect(new TextDecoder().decode(data)).toBe("<p>Hi <b>there</b></p>");
  });

  test("download errors", async () => {
    const storage = new DiskStorage(base);
    await expect(storage.download("/nope.txt")).rejects.toThrow("download /nope.txt: path/not_found");
    await expect(storage.download("/../outside.txt")).rejects.toThrow(
      "path outside namespace: /../outside.txt",
    );
  });

  test("export serves markdown only", async () => {
    writeFileSync(join(base, "plan.paper"), "# Plan");
    const storage = new DiskStorage(base);

    const data = await storage.export("/plan.paper", "markdown");
    expect(new TextDecoder().decode(data)).toBe("# Plan");
    await expect(storage.export("/plan.paper", "html")).rejects.toThrow(
      "export /plan.paper: unsupported export format html",
    );
  });

  test("whoami names the local namespace", async () => {
    expect(await new DiskStorage(base).whoami()).toEqual({
      accountId: "local",
      rootNamespaceId: "local",
    });
  });
});

describe("disk-backed loader", () => {
  test("loads a local tree through the configured provider", async () => {
    const staging = makeTmpDir();
    const loader = DropboxLoader.fromConfig({
      storage: { provider: "disk", config: { basePath: base, pageSize: 1 } },
      tempDir: staging,
    });

    const result = await loader.load({ auth: "test-token", folderPath: "" });
    rmSync(staging, { recursive: true, force: true });

    expect(result.records).toEqual([
      { content: "Hello", source: "https://www.dropbox.com/home?preview=notes.txt", kind: "file" },
      {
        content: "Hi there",
        source: "https://www.dropbox.com/home/web?preview=page.html",
        kind: "file",
      },
    ]);
    expect(result.invalidFiles).toEqual(["/tool.exe"]);
    expect(result.errors).toEqual([]);
  });
});
