/**
 * Format-specific text extractor contract.
 */

/** One run of text; `page` is 1-based where the format has pages. */
export interface ExtractedSegment {
  text: string;
  page?: number;
}

export interface TextExtractor {
  extract(data: Uint8Array): Promise<ExtractedSegment[]>;
}

export function decodeUtf8(data: Uint8Array): string {
  return new TextDecoder("utf-8").decode(data);
}
