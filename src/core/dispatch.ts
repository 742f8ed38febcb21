/**
 * Extraction dispatch: staged file → normalized records.
 */
import { readFile } from "node:fs/promises";
import {
  EXTRACTOR_REGISTRY,
  getExtractorConfig,
  type ExtractorRegistry,
} from "../extractors/registry.js";
import type { ExtractedSegment } from "../extractors/types.js";
import { ContentFault, errorMessage } from "./exceptions.js";
import type { ProgressLog } from "./progress.js";
import type { ExtractedRecord, FileKind } from "./types.js";

export type ExtractionOutcome =
  | { status: "extracted"; records: ExtractedRecord[] }
  | { status: "failed"; fault: ContentFault };

export function stripNullBytes(content: string): string {
  return content.replaceAll("\x00", " ");
}

function toRecord(
  segment: ExtractedSegment,
  source: string,
  keepPages: boolean,
): ExtractedRecord {
  const record: ExtractedRecord = {
    content: stripNullBytes(segment.text),
    source,
    kind: "file",
  };
  if (keepPages && segment.page !== undefined && segment.page > 0) {
    record.page = segment.page;
  }
  return record;
}

/**
 * Run the extractor registered for `kind` against the staged file at
 * `localPath`. Extractor faults are logged against `file` and come back as a
 * failed outcome with no records.
 */
export async function extractFile(
  kind: FileKind,
  localPath: string,
  file: string,
  source: string,
  log: ProgressLog,
  registry: ExtractorRegistry = EXTRACTOR_REGISTRY,
): Promise<ExtractionOutcome> {
  const config = getExtractorConfig(kind, registry);

  let segments: ExtractedSegment[];
  try {
    const data = new Uint8Array(await readFile(localPath));
    segments = await new config.extractor().extract(data);
  } catch (err) {
    const fault = new ContentFault(file, errorMessage(err), { cause: err });
    log.warning(fault.message, { kind: "file", path: file });
    return { status: "failed", fault };
  }

  const records = segments.map((s) => toRecord(s, source, config.keepPages));
  log.debug(`Extracted ${records.length} record(s) from ${file}`, {
    kind: "file",
    path: file,
  });
  return { status: "extracted", records };
}
