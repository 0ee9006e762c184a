/**
 * Environment-variable assignments, one per line:
 *
 *   KEY=value
 *   export KEY="quoted\tvalue"
 *   KEY='verbatim'
 *
 * Blank lines and `#` comments are skipped. Two or more assignments make
 * a block, which the classifier splits into independent records.
 */

import { overlapsAny } from "../core/spans.js";
import type { Detection, Detector } from "../core/types.js";
import type { EnvVarItem } from "../metadata/schema.js";

const KEY_PATTERN = /^[A-Z_][A-Z0-9_]*$/;
const EXPORT_PREFIX = /^export\s+/;

type Assignment = Omit<EnvVarItem, "confidence">;

function unescapeDoubleQuoted(value: string): string {
  return value.replace(/\\([nrt\\"])/g, (_, ch: string) => {
    switch (ch) {
      case "n":
        return "\n";
      case "r":
        return "\r";
      case "t":
        return "\t";
      default:
        return ch;
    }
  });
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return unescapeDoubleQuoted(value.slice(1, -1));
  }
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }
  return value;
}

export function parseAssignment(line: string): Assignment | null {
  const isExported = EXPORT_PREFIX.test(line);
  const body = isExported ? line.replace(EXPORT_PREFIX, "") : line;
  const eq = body.indexOf("=");
  if (eq <= 0) return null;

  const key = body.slice(0, eq).trim();
  if (!KEY_PATTERN.test(key)) return null;
  return { key, value: unquote(body.slice(eq + 1).trim()), isExported };
}

/** Text form of an assignment as stored in a split record. */
export function formatAssignment(item: Pick<EnvVarItem, "key" | "value" | "isExported">): string {
  return `${item.isExported ? "export " : ""}${item.key}=${item.value}`;
}

export function isEnvBlock(detections: readonly Detection<EnvVarItem>[]): boolean {
  return detections.length >= 2;
}

export const envVarDetector: Detector<EnvVarItem> = {
  detect(text, ctx) {
    const parsed: Array<{ assignment: Assignment; start: number; end: number; raw: string }> = [];
    let meaningful = 0;
    let offset = 0;

    for (const rawLine of text.split("\n")) {
      const lineStart = offset;
      offset += rawLine.length + 1;

      const line = rawLine.trim();
      if (line.length === 0 || line.startsWith("#")) continue;
      meaningful++;

      const assignment = parseAssignment(line);
      if (!assignment) continue;
      const start = lineStart + rawLine.indexOf(line);
      parsed.push({ assignment, start, end: start + line.length, raw: line });
    }

    if (parsed.length === 0) return [];
    const confidence = parsed.length === meaningful ? 0.95 : 0.75;

    const found: Detection<EnvVarItem>[] = [];
    for (const { assignment, start, end, raw } of parsed) {
      const span = { start, end };
      if (overlapsAny(span, ctx.ignoreSpans)) continue;
      found.push({ match: raw, span, item: { ...assignment, confidence } });
    }
    return found;
  },
};
