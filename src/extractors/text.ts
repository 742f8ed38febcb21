import type { ExtractedSegment, TextExtractor } from "./types.js";
import { decodeUtf8 } from "./types.js";

export class PlainTextExtractor implements TextExtractor {
  async extract(data: Uint8Array): Promise<ExtractedSegment[]> {
    return [{ text: decodeUtf8(data).trim() }];
  }
}
