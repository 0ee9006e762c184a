import type { Detection, Detector } from "../core/types.js";
import type { ProseItem } from "../metadata/schema.js";
import { clamp } from "../core/text.js";

export const ACCEPT_THRESHOLD = 0.6;
const MIN_LENGTH = 40;
const MIN_WORDS = 12;
const WORDS_PER_MINUTE = 200;

const CODE_TOKENS = ["```", "{", "}", ";", "#include", "=>", "->", "::", ":=", "<html", "</"];
// Keywords only count as code when they open a line.
const CODE_KEYWORD_LINE = /^\s*(?:import|func|struct|class|let|var|const|def|fn)\s+[\w{*]/m;
const SQL_QUERY = /\bselect\s+[\w*,\s]+\s+from\s+\w+/i;
const WORD = /[\p{L}\p{N}]+(?:'[\p{L}\p{N}]+)?/gu;

function containsCodeSignals(text: string): boolean {
  if (CODE_TOKENS.some((t) => text.includes(t))) return true;
  return CODE_KEYWORD_LINE.test(text) || SQL_QUERY.test(text);
}

/** Mostly `KEY=value` or `key: value` lines. */
function looksStructured(text: string): boolean {
  const lines = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
  if (lines.length === 0) return false;

  let structured = 0;
  for (const line of lines) {
    if (line.startsWith("#")) continue;
    if (line.indexOf("=") > 0) {
      structured++;
      continue;
    }
    const colon = line.indexOf(":");
    if (colon > 0 && !/\s/.test(line.slice(0, colon))) structured++;
  }
  return structured >= 2 && structured / lines.length >= 0.5;
}

function symbolRatio(text: string): number {
  let total = 0;
  let symbols = 0;
  for (const ch of text) {
    total++;
    if (!/[\p{L}\s]/u.test(ch)) symbols++;
  }
  return total === 0 ? 0 : symbols / total;
}

export function analyzeProse(text: string): ProseItem | null {
  const trimmed = text.trim();
  if (trimmed.length < MIN_LENGTH) return null;
  if (containsCodeSignals(trimmed) || looksStructured(trimmed)) return null;

  const words = trimmed.match(WORD)?.length ?? 0;
  if (words < MIN_WORDS) return null;

  const sentences = trimmed.match(/[.!?]/g)?.length ?? 0;
  if (sentences < 1 && words < 30) return null;

  let confidence = 0.55;
  confidence += Math.min(0.25, words / 80);
  confidence += Math.min(0.15, sentences * 0.07);
  confidence -= Math.min(0.3, symbolRatio(trimmed) * 0.6);
  confidence = clamp(confidence, 0, 0.95);
  if (confidence < ACCEPT_THRESHOLD) return null;

  return {
    wordCount: words,
    estimatedReadingTimeSeconds: Math.ceil((words / WORDS_PER_MINUTE) * 60),
    confidence,
  };
}

export const proseDetector: Detector<ProseItem> = {
  detect(text) {
    const item = analyzeProse(text);
    if (!item) return [];
    const start = text.length - text.trimStart().length;
    const match = text.trim();
    const found: Detection<ProseItem> = { match, span: { start, end: start + match.length }, item };
    return [found];
  },
};
