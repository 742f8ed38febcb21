/**
 * Shared test fixtures: in-memory storage, session factory, stand-in
 * extractors and small documents built in memory.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { strToU8, zipSync } from "fflate";

import { StorageRequestError } from "../src/core/exceptions.js";
import { FileKind } from "../src/core/types.js";
import {
  EXTRACTOR_REGISTRY,
  type ExtractorRegistry,
} from "../src/extractors/registry.js";
import type { ExtractedSegment, TextExtractor } from "../src/extractors/types.js";
import type {
  AccountInfo,
  Credentials,
  ListOptions,
  ListPage,
  SessionFactory,
  SessionScope,
  StorageBackend,
  StorageEntry,
} from "../src/storage/backend.js";

export const ROOT_NAMESPACE = "ns-root";

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "dropbox-loader-test-"));
}

export function fileEntry(pathDisplay: string): StorageEntry {
  const name = pathDisplay.split("/").pop() ?? "";
  return { type: "file", name, path: pathDisplay.toLowerCase(), pathDisplay };
}

export function folderEntry(pathDisplay: string): StorageEntry {
  return { ...fileEntry(pathDisplay), type: "folder" };
}

// ---------------------------------------------------------------------------
// In-memory storage
// ---------------------------------------------------------------------------

export interface FakeStorageOptions {
  /** Display path → file content. */
  files?: Record<string, string | Uint8Array>;
  /** Folder display paths listed ahead of the files. */
  folders?: string[];
  /** Display path → exported markdown. */
  exports?: Record<string, string>;
  pageSize?: number;
  /** Scripted listing pages; replaces the listing built from `files`. */
  pages?: StorageEntry[][];
  failDownloads?: string[];
  hangDownloads?: string[];
  /** 1-based page number whose request fails. */
  failListingAt?: number;
  whoamiError?: Error;
}

interface FakeCursor {
  path: string;
  recursive: boolean;
  page: number;
}

export class FakeStorage implements StorageBackend {
  readonly calls: string[] = [];
  private files: Map<string, Uint8Array>;
  private opts: FakeStorageOptions;
  private cursors = new Map<string, FakeCursor>();

  constructor(opts: FakeStorageOptions = {}) {
    this.opts = opts;
    this.files = new Map(
      Object.entries(opts.files ?? {}).map(([path, content]) => [
        path.toLowerCase(),
        typeof content === "string" ? new TextEncoder().encode(content) : content,
      ]),
    );
  }

  private listing(path: string, recursive: boolean): StorageEntry[] {
    const prefix = path ? `${path.toLowerCase()}/` : "/";
    const within = (p: string): boolean => {
      const lower = p.toLowerCase();
      if (!lower.startsWith(prefix)) return false;
      return recursive || !lower.slice(prefix.length).includes("/");
    };
    return [
      ...(this.opts.folders ?? []).filter(within).map(folderEntry),
      ...Object.keys(this.opts.files ?? {}).filter(within).map(fileEntry),
    ];
  }

  private page(cursor: FakeCursor): ListPage {
    if (this.opts.failListingAt === cursor.page) {
      throw new StorageRequestError("list_folder: internal_error", { status: 500 });
    }

    let entries: StorageEntry[];
    let hasMore: boolean;
    if (this.opts.pages) {
      entries = this.opts.pages[cursor.page - 1] ?? [];
      hasMore = cursor.page < this.opts.pages.length;
    } else {
      const all = this.listing(cursor.path, cursor.recursive);
      const size = this.opts.pageSize ?? 100;
      entries = all.slice((cursor.page - 1) * size, cursor.page * size);
      hasMore = cursor.page * size < all.length;
    }

    const next = `cursor-${cursor.page}`;
    this.cursors.set(next, { ...cursor, page: cursor.page + 1 });
    return { entries, cursor: next, hasMore };
  }

  async listFolder(path: string, options: ListOptions): Promise<ListPage> {
    this.calls.push(`list ${path}`);
    return this.page({ path, recursive: options.recursive, page: 1 });
  }

  async listFolderContinue(cursor: string): Promise<ListPage> {
    this.calls.push(`continue ${cursor}`);
    const state = this.cursors.get(cursor);
    if (!state) {
      throw new StorageRequestError("list_folder/continue: reset", { status: 409 });
    }
    return this.page(state);
  }

  async download(path: string): Promise<Uint8Array> {
    this.calls.push(`download ${path}`);
    const lower = path.toLowerCase();
    if (this.opts.hangDownloads?.some((p) => p.toLowerCase() === lower)) {
      return new Promise<Uint8Array>(() => {});
    }
    const data = this.files.get(lower);
    if (!data || this.opts.failDownloads?.some((p) => p.toLowerCase() === lower)) {
      throw new StorageRequestError(`download ${path}: path/not_found`, {
        status: 409,
      });
    }
    return data;
  }

  async export(path: string, format: string): Promise<Uint8Array> {
    this.calls.push(`export ${path} ${format}`);
    const content = this.opts.exports?.[path];
    if (content === undefined) {
      throw new StorageRequestError(`export ${path}: path/not_found`, {
        status: 409,
      });
    }
    return new TextEncoder().encode(content);
  }

  async whoami(): Promise<AccountInfo> {
    this.calls.push("whoami");
    if (this.opts.whoamiError) throw this.opts.whoamiError;
    return { accountId: "dbid:test-account", rootNamespaceId: ROOT_NAMESPACE };
  }
}

// ---------------------------------------------------------------------------
// Session factory
// ---------------------------------------------------------------------------

export class FakeSessionFactory implements SessionFactory {
  readonly scopes: SessionScope[] = [];
  readonly credentials: Credentials[] = [];
  private personal: StorageBackend;
  private team: StorageBackend;
  private failure: Error | null;

  constructor(
    personal: StorageBackend,
    opts: { team?: StorageBackend; failWith?: Error } = {},
  ) {
    this.personal = personal;
    this.team = opts.team ?? personal;
    this.failure = opts.failWith ?? null;
  }

  async authenticate(
    credentials: Credentials,
    scope: SessionScope,
  ): Promise<StorageBackend> {
    this.scopes.push(scope);
    this.credentials.push(credentials);
    if (this.failure) throw this.failure;
    return scope.kind === "team" ? this.team : this.personal;
  }
}

// ---------------------------------------------------------------------------
// Extractors
// ---------------------------------------------------------------------------

/** Treats the bytes as text with pages separated by form feeds. */
export class FormFeedPdfExtractor implements TextExtractor {
  async extract(data: Uint8Array): Promise<ExtractedSegment[]> {
    return new TextDecoder()
      .decode(data)
      .split("\f")
      .map((text, i) => ({ text, page: i + 1 }));
  }
}

export class BrokenExtractor implements TextExtractor {
  async extract(): Promise<ExtractedSegment[]> {
    throw new Error("file is encrypted");
  }
}

export const PAGED_REGISTRY: ExtractorRegistry = {
  ...EXTRACTOR_REGISTRY,
  [FileKind.Pdf]: { extractor: FormFeedPdfExtractor, keepPages: true },
};

export const AUTH = { access_token: "test-token" };

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

/** A PDF with one Helvetica text line per page. Text must be plain ASCII. */
export function buildPdf(pages: string[]): Uint8Array {
  const objects: string[] = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    `<< /Type /Pages /Kids [${pages.map((_, i) => `${4 + 2 * i} 0 R`).join(" ")}] /Count ${pages.length} >>`,
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>",
  ];
  pages.forEach((text, i) => {
    const stream = `BT /F1 12 Tf 20 100 Td (${text}) Tj ET`;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 200 200] ` +
        `/Resources << /Font << /F1 3 0 R >> >> /Contents ${5 + 2 * i} 0 R >>`,
      `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`,
    );
  });

  let body = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(body.length);
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefAt = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, "0")} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefAt}\n%%EOF\n`;
  return strToU8(body);
}

/** The three parts a word processor needs to open a document. */
export function buildDocx(paragraphs: string[]): Uint8Array {
  const body = paragraphs.map((p) => `<w:p><w:r><w:t>${p}</w:t></w:r></w:p>`).join("");
  return zipSync({
    "[Content_Types].xml": strToU8(
      '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
        '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
        '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
        '<Default Extension="xml" ContentType="application/xml"/>' +
        '<Override PartName="/word/document.xml" ' +
        'ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
        "</Types>",
    ),
    "_rels/.rels": strToU8(
      '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
        '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
        '<Relationship Id="rId1" ' +
        'Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" ' +
        'Target="word/document.xml"/></Relationships>',
    ),
    "word/document.xml": strToU8(
      '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
        '<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">' +
        `<w:body>${body}</w:body></w:document>`,
    ),
  });
}
