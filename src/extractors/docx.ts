import mammoth from "mammoth";
import type { ExtractedSegment, TextExtractor } from "./types.js";

export class DocxExtractor implements TextExtractor {
  async extract(data: Uint8Array): Promise<ExtractedSegment[]> {
    const { value } = await mammoth.extractRawText({
      buffer: Buffer.from(data.buffer, data.byteOffset, data.byteLength),
    });
    return [{ text: value.replace(/\n{3,}/g, "\n\n").trim() }];
  }
}
