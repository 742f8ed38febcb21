import * as pdfjsLib from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ExtractedSegment, TextExtractor } from "./types.js";

/** One segment per page, numbered from 1. Encrypted or malformed files reject. */
export class PdfExtractor implements TextExtractor {
  async extract(data: Uint8Array): Promise<ExtractedSegment[]> {
    // pdf.js detaches the buffer it is handed
    const loadingTask = pdfjsLib.getDocument({
      data: data.slice(),
      isEvalSupported: false,
      // pdf.js warns on stdout, which carries the CLI's records
      verbosity: pdfjsLib.VerbosityLevel.ERRORS,
    });

    try {
      const pdf = await loadingTask.promise;
      const segments: ExtractedSegment[] = [];
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        const content = await page.getTextContent();
        let text = "";
        for (const item of content.items) {
          if (!("str" in item)) continue;
          text += item.str;
          if (item.hasEOL) text += "\n";
        }
        segments.push({ text: text.trim(), page: i });
      }
      return segments;
    } finally {
      await loadingTask.destroy();
    }
  }
}
