/**
 * RTF to plain text.
 *
 * Handles the subset that carries text: groups, escaped characters, `\'hh`
 * code-page bytes, `\uN` with its fallback skip, and the paragraph/tab control
 * words. Destination groups that hold no body text are skipped.
 */
import type { ExtractedSegment, TextExtractor } from "./types.js";
import { decodeUtf8 } from "./types.js";

const SKIPPED_DESTINATIONS = new Set([
  "fonttbl",
  "colortbl",
  "stylesheet",
  "info",
  "pict",
  "object",
  "header",
  "headerl",
  "headerr",
  "headerf",
  "footer",
  "footerl",
  "footerr",
  "footerf",
  "footnote",
  "fldinst",
  "listtable",
  "listoverridetable",
  "rsidtbl",
  "generator",
  "xmlnstbl",
  "themedata",
  "datastore",
  "latentstyles",
  "colorschememapping",
  "filetbl",
  "revtbl",
]);

const CONTROL_TEXT: Record<string, string> = {
  par: "\n",
  line: "\n",
  sect: "\n",
  page: "\n",
  row: "\n",
  tab: "\t",
  cell: "\t",
  emdash: "—",
  endash: "–",
  bullet: "•",
  lquote: "‘",
  rquote: "’",
  ldblquote: "“",
  rdblquote: "”",
};

interface GroupState {
  ignorable: boolean;
  ucSkip: number;
}

const codePage = new TextDecoder("windows-1252");

export function rtfToText(rtf: string): string {
  const stack: GroupState[] = [];
  let state: GroupState = { ignorable: false, ucSkip: 1 };
  let out = "";
  // fallback characters still to drop after a \uN
  let pendingSkip = 0;

  const emit = (text: string): void => {
    if (state.ignorable) return;
    if (pendingSkip > 0) {
      pendingSkip--;
      return;
    }
    out += text;
  };

  let i = 0;
  while (i < rtf.length) {
    const ch = rtf.charAt(i);

    if (ch === "{") {
      stack.push(state);
      state = { ...state };
      pendingSkip = 0;
      i++;
      continue;
    }
    if (ch === "}") {
      state = stack.pop() ?? state;
      pendingSkip = 0;
      i++;
      continue;
    }
    if (ch === "\r" || ch === "\n") {
      i++;
      continue;
    }
    if (ch !== "\\") {
      emit(ch);
      i++;
      continue;
    }

    const next = rtf.charAt(i + 1);
    if (next === "\\" || next === "{" || next === "}") {
      emit(next);
      i += 2;
      continue;
    }
    if (next === "'") {
      const code = Number.parseInt(rtf.slice(i + 2, i + 4), 16);
      if (!Number.isNaN(code)) emit(codePage.decode(Uint8Array.of(code)));
      i += 4;
      continue;
    }
    if (next === "*") {
      state.ignorable = true;
      i += 2;
      continue;
    }
    if (next === "~") {
      emit(" ");
      i += 2;
      continue;
    }
    if (next === "_") {
      emit("-");
      i += 2;
      continue;
    }
    if (next === "\r" || next === "\n") {
      emit("\n");
      i += 2;
      continue;
    }

    const match = /^([a-zA-Z]+)(-?\d+)? ?/.exec(rtf.slice(i + 1, i + 40));
    if (!match) {
      // unknown control symbol such as \- or \|
      i += 2;
      continue;
    }
    i += 1 + match[0].length;

    const word = match[1] ?? "";
    const param = match[2] === undefined ? null : Number(match[2]);
    // a \uN fallback is never a control word
    if (word !== "u") pendingSkip = 0;

    if (SKIPPED_DESTINATIONS.has(word)) {
      state.ignorable = true;
    } else if (word === "uc" && param !== null) {
      state.ucSkip = param;
    } else if (word === "u" && param !== null) {
      pendingSkip = 0;
      emit(String.fromCharCode(param < 0 ? param + 65536 : param));
      if (!state.ignorable) pendingSkip = state.ucSkip;
    } else if (Object.hasOwn(CONTROL_TEXT, word)) {
      emit(CONTROL_TEXT[word] ?? "");
    }
  }

  return out;
}

export class RtfExtractor implements TextExtractor {
  async extract(data: Uint8Array): Promise<ExtractedSegment[]> {
    return [{ text: rtfToText(decodeUtf8(data)).trim() }];
  }
}
