/**
 * Shell command detection.
 *
 * Scores each line on its executable, shell syntax, flags and
 * sub-commands. Executables that double as everyday English words
 * ("find", "make", "open") score lower and need supporting evidence.
 */

import { z } from "zod";
import { loadDataFile } from "../core/data.js";
import { overlapsAny } from "../core/spans.js";
import { countWords } from "../core/text.js";
import type { Detection, Detector } from "../core/types.js";
import type { ShellCommandItem } from "../metadata/schema.js";

const ShellTableSchema = z.object({
  commands: z.array(z.string()),
  ambiguous: z.array(z.string()),
  subcommands: z.array(z.string()),
});

const TABLE = loadDataFile("shell-commands.json", ShellTableSchema);
const COMMANDS = new Set(TABLE.commands);
const AMBIGUOUS = new Set(TABLE.ambiguous);
const SUBCOMMANDS = new Set(TABLE.subcommands);

export const ACCEPT_THRESHOLD = 0.5;
const MAX_LENGTH = 1000;

const SHELL_PATTERNS: Array<{ pattern: RegExp; weight: number }> = [
  { pattern: /^\s*\$\s+/, weight: 0.95 }, // $ prompt
  { pattern: /^\s*>\s+/, weight: 0.8 }, // > prompt
  { pattern: /^#!/, weight: 0.99 },
  { pattern: /\|\s*\w+/, weight: 0.9 },
  { pattern: /\s&&\s/, weight: 0.9 },
  { pattern: /\s\|\|\s/, weight: 0.9 },
  { pattern: /\s*;\s*\w+/, weight: 0.8 },
  { pattern: />\s*\/dev\/null/, weight: 0.95 },
  { pattern: /2>&1/, weight: 0.95 },
  { pattern: />\s*\S+/, weight: 0.7 },
  { pattern: /<\s*\S+/, weight: 0.7 },
  { pattern: /\$\([^)]+\)/, weight: 0.9 }, // $(...)
  { pattern: /`[^`]+`/, weight: 0.85 },
  { pattern: /\$\{\w+[^}]*\}/, weight: 0.85 }, // ${...}
  { pattern: /\$[A-Z_][A-Z0-9_]*/, weight: 0.7 }, // $ENV_VAR
];

const FLAG_PATTERNS: Array<{ pattern: RegExp; weight: number }> = [
  { pattern: /\s--[a-z][-a-z0-9]*/, weight: 0.6 },
  { pattern: /\s--[a-z][-a-z0-9]*=/, weight: 0.7 },
  { pattern: /\s-[a-zA-Z]\s/, weight: 0.4 },
  { pattern: /\s-[a-zA-Z]$/, weight: 0.4 },
  { pattern: /\s-[a-zA-Z][a-zA-Z]+/, weight: 0.5 },
];

const SIMPLE_PROMPT = /^\s*[$>%#]\s+/;
const USER_HOST_PROMPT = /^[\w.-]+@[\w.-]+(?::[^\s$#%>]*)?\s?[$#%>]\s+/;

export function scoreLine(line: string): ShellCommandItem | null {
  const trimmed = line.trim();
  if (trimmed.length < 2) return null;

  const command = trimmed.replace(SIMPLE_PROMPT, "").replace(USER_HOST_PROMPT, "");
  const words = command.split(" ").filter((w) => w.length > 0);
  const first = words[0];
  if (first === undefined) return null;

  // ./script.sh or /usr/bin/env
  const executable = (first.split("/").pop() ?? first).toLowerCase();

  let confidence = 0;
  if (COMMANDS.has(executable)) confidence += AMBIGUOUS.has(executable) ? 0.35 : 0.65;

  for (const { pattern, weight } of SHELL_PATTERNS) {
    if (pattern.test(trimmed)) confidence += weight * 0.4;
  }

  let flagScore = 0;
  for (const { pattern, weight } of FLAG_PATTERNS) {
    if (pattern.test(command)) flagScore += weight;
  }
  confidence += Math.min(flagScore, 0.4);

  const second = words[1];
  if (second !== undefined) {
    if (command.includes(" -") || /\s\S+\/\S+/.test(command)) confidence += 0.15;
    if (SUBCOMMANDS.has(second.toLowerCase())) confidence += 0.2;
  }

  confidence = Math.min(confidence, 1);
  if (confidence < ACCEPT_THRESHOLD) return null;
  return { command, executable, confidence };
}

function looksLikeSentences(text: string): boolean {
  const periods = text.split(".").length - 1;
  const words = countWords(text);
  return periods > 2 && periods / Math.max(words, 1) > 0.1;
}

export const shellCommandDetector: Detector<ShellCommandItem> = {
  detect(text, ctx) {
    const trimmed = text.trim();
    if (trimmed.length === 0 || trimmed.length > MAX_LENGTH) return [];
    if (looksLikeSentences(trimmed)) return [];

    const found: Detection<ShellCommandItem>[] = [];
    let lineCount = 0;
    let offset = 0;

    for (const rawLine of text.split("\n")) {
      const lineStart = offset;
      offset += rawLine.length + 1;

      const line = rawLine.trim();
      if (line.length === 0 || line.startsWith("#")) continue;
      lineCount++;

      const item = scoreLine(line);
      if (!item) continue;
      const start = lineStart + rawLine.indexOf(line);
      const span = { start, end: start + line.length };
      if (overlapsAny(span, ctx.ignoreSpans)) continue;
      found.push({ match: line, span, item });
    }

    if (found.length > 0) {
      return found.length / Math.max(lineCount, 1) >= 0.5 ? found : [];
    }

    // Scripts that start with a shebang or comment.
    const whole = scoreLine(trimmed);
    if (!whole) return [];
    const start = text.indexOf(trimmed);
    const span = { start, end: start + trimmed.length };
    return overlapsAny(span, ctx.ignoreSpans) ? [] : [{ match: trimmed, span, item: whole }];
  },
};
