/**
 * PPTX slide text: each `ppt/slides/slideN.xml` in slide order, one line per
 * DrawingML paragraph.
 */
import { load } from "cheerio";
import { strFromU8, unzipSync } from "fflate";
import type { ExtractedSegment, TextExtractor } from "./types.js";

const SLIDE_PATTERN = /^ppt\/slides\/slide(\d+)\.xml$/;

function slideText(xml: string): string {
  const $ = load(xml, { xml: true });
  const lines: string[] = [];
  $("a\\:p").each((_, paragraph) => {
    const line = $(paragraph).find("a\\:t").text();
    if (line.trim()) lines.push(line);
  });
  return lines.join("\n");
}

export class PresentationExtractor implements TextExtractor {
  async extract(data: Uint8Array): Promise<ExtractedSegment[]> {
    const entries = unzipSync(data, {
      filter: (file) => SLIDE_PATTERN.test(file.name),
    });

    const slides: { index: number; text: string }[] = [];
    for (const [name, bytes] of Object.entries(entries)) {
      const match = SLIDE_PATTERN.exec(name);
      if (!match) continue;
      slides.push({ index: Number(match[1]), text: slideText(strFromU8(bytes)) });
    }
    slides.sort((a, b) => a.index - b.index);

    return [
      {
        text: slides
          .map((s) => s.text)
          .filter((t) => t.length > 0)
          .join("\n\n"),
      },
    ];
  }
}
