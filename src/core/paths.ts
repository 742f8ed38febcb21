/**
 * Path classification: extension, stem, eligibility and source locator.
 */
import { FileKind } from "./types.js";

/** Allow-listed extensions and the kind each one routes to. */
export const EXTENSION_KINDS: Readonly<Record<string, FileKind>> = {
  md: FileKind.Markdown,
  htm: FileKind.Html,
  html: FileKind.Html,
  docx: FileKind.Docx,
  xls: FileKind.Spreadsheet,
  xlsx: FileKind.Spreadsheet,
  pptx: FileKind.Presentation,
  pdf: FileKind.Pdf,
  rtf: FileKind.Rtf,
  txt: FileKind.Text,
  paper: FileKind.Paper,
};

export const ALLOWED_EXTENSIONS: readonly string[] = Object.keys(EXTENSION_KINDS);

const WEB_BASE_URL = "https://www.dropbox.com/home";

export interface PathClass {
  extension: string;
  stem: string;
  kind: FileKind | null;
  eligible: boolean;
}

function segments(path: string): string[] {
  return path.split("/").filter((s) => s.length > 0);
}

export function fileName(path: string): string {
  const parts = segments(path);
  return parts[parts.length - 1] ?? "";
}

export function classify(path: string): PathClass {
  const name = fileName(path);
  const dot = name.lastIndexOf(".");

  // ".env" style names have no extension
  if (dot <= 0) {
    return { extension: "", stem: name, kind: null, eligible: false };
  }

  const extension = name.slice(dot + 1).toLowerCase();
  const stem = name.slice(0, dot);
  const kind = Object.hasOwn(EXTENSION_KINDS, extension)
    ? EXTENSION_KINDS[extension] ?? null
    : null;

  return { extension, stem, kind, eligible: kind !== null };
}

/** Web preview URL for a file, e.g. `https://www.dropbox.com/home/Docs?preview=a.pdf`. */
export function locate(path: string): string {
  const parts = segments(path);
  const name = parts.pop() ?? "";
  const folder = parts.map((p) => encodeURIComponent(p)).join("/");
  const base = folder ? `${WEB_BASE_URL}/${folder}` : WEB_BASE_URL;
  return `${base}?preview=${encodeURIComponent(name)}`;
}
