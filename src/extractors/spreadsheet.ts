import { read, utils } from "xlsx";
import type { ExtractedSegment, TextExtractor } from "./types.js";

/** Each non-empty sheet as CSV under its name, in workbook order. */
export class SpreadsheetExtractor implements TextExtractor {
  async extract(data: Uint8Array): Promise<ExtractedSegment[]> {
    const workbook = read(data, { type: "array" });
    const sheets: string[] = [];

    for (const name of workbook.SheetNames) {
      const sheet = workbook.Sheets[name];
      if (!sheet) continue;
      const csv = utils.sheet_to_csv(sheet, { blankrows: false }).trim();
      if (csv) sheets.push(`${name}\n${csv}`);
    }

    return [{ text: sheets.join("\n\n") }];
  }
}
