import { remark } from "remark";
import remarkGfm from "remark-gfm";
import stripMarkdown from "strip-markdown";
import type { ExtractedSegment, TextExtractor } from "./types.js";
import { decodeUtf8 } from "./types.js";

export async function markdownToText(markdown: string): Promise<string> {
  const file = await remark().use(remarkGfm).use(stripMarkdown).process(markdown);
  return String(file).trim();
}

export class MarkdownExtractor implements TextExtractor {
  async extract(data: Uint8Array): Promise<ExtractedSegment[]> {
    return [{ text: await markdownToText(decodeUtf8(data)) }];
  }
}
