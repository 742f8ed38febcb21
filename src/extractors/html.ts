import { load } from "cheerio";
import type { ExtractedSegment, TextExtractor } from "./types.js";
import { decodeUtf8 } from "./types.js";

const DROPPED = "script, style, noscript, template";
const BLOCKS =
  "title, p, div, br, li, tr, h1, h2, h3, h4, h5, h6, section, article, header, footer, blockquote, pre";

/** Plain-text projection of an HTML document with whitespace collapsed. */
export function htmlToText(html: string): string {
  const $ = load(html);
  $(DROPPED).remove();
  // keep words in adjacent blocks apart once tags are gone
  $(BLOCKS).append("\n");
  return $.root().text().replace(/\s+/g, " ").trim();
}

export class HtmlExtractor implements TextExtractor {
  async extract(data: Uint8Array): Promise<ExtractedSegment[]> {
    return [{ text: htmlToText(decodeUtf8(data)) }];
  }
}
