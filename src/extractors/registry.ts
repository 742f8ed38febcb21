/**
 * Extractor registry – maps every FileKind to its extraction routine.
 */
import { FileKind } from "../core/types.js";
import { DocxExtractor } from "./docx.js";
import { HtmlExtractor } from "./html.js";
import { MarkdownExtractor } from "./markdown.js";
import { PdfExtractor } from "./pdf.js";
import { PresentationExtractor } from "./presentation.js";
import { RtfExtractor } from "./rtf.js";
import { SpreadsheetExtractor } from "./spreadsheet.js";
import { PlainTextExtractor } from "./text.js";
import type { TextExtractor } from "./types.js";

// ---------------------------------------------------------------------------
// Config types
// ---------------------------------------------------------------------------

export interface ExtractorConfig {
  extractor: new () => TextExtractor;
  /** Keep the extractor's page numbers on the records (PDF only). */
  keepPages: boolean;
  /** Fetch through the export endpoint in this format instead of downloading. */
  exportFormat?: string;
}

export type ExtractorRegistry = Record<FileKind, ExtractorConfig>;

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export const EXTRACTOR_REGISTRY = {
  [FileKind.Text]: { extractor: PlainTextExtractor, keepPages: false },
  [FileKind.Html]: { extractor: HtmlExtractor, keepPages: false },
  [FileKind.Rtf]: { extractor: RtfExtractor, keepPages: false },
  [FileKind.Pdf]: { extractor: PdfExtractor, keepPages: true },
  [FileKind.Docx]: { extractor: DocxExtractor, keepPages: false },
  [FileKind.Spreadsheet]: { extractor: SpreadsheetExtractor, keepPages: false },
  [FileKind.Presentation]: { extractor: PresentationExtractor, keepPages: false },
  [FileKind.Markdown]: { extractor: MarkdownExtractor, keepPages: false },
  [FileKind.Paper]: {
    extractor: MarkdownExtractor,
    keepPages: false,
    exportFormat: "markdown",
  },
} satisfies ExtractorRegistry;

export function getExtractorConfig(
  kind: FileKind,
  registry: ExtractorRegistry = EXTRACTOR_REGISTRY,
): ExtractorConfig {
  return registry[kind];
}
