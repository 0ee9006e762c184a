/**
 * Source-code language detection.
 *
 * Fenced blocks are scored individually when present, otherwise the whole
 * text is one candidate. JSON, HTML and CSS have strong structural checks;
 * everything else is scored from weighted language signals and the best
 * language wins.
 */

import type { CodeLanguage, Detection, Detector, Span } from "../core/types.js";
import { overlapsAny } from "../core/spans.js";
import type { CodeItem } from "../metadata/schema.js";

export const ACCEPT_THRESHOLD = 0.6;

type Signal = [pattern: RegExp, weight: number];

type LanguageScore = {
  language: CodeLanguage;
  cap: number;
  signals: Signal[];
};

const JAVASCRIPT: LanguageScore = {
  language: "javaScript",
  cap: 0.9,
  signals: [
    [/\bconsole\.\w+/, 0.2],
    [/\b(?:const|let|var)\s+\w+\s*=/, 0.2],
    [/\bfunction\b/, 0.2],
    [/=>/, 0.2],
    [/^\s*(?:export|import)\s/m, 0.1],
  ],
};

const LANGUAGES: LanguageScore[] = [
  {
    language: "swift",
    cap: 0.95,
    signals: [
      [/\bimport SwiftUI\b/, 0.6],
      [/\b(?:struct|enum|protocol)\s+\w+/, 0.2],
      [/\bfunc\s+\w+\s*\(/, 0.2],
      [/\b(?:let|var)\s+\w+/, 0.1],
      [/:\s*(?:String|Int|Bool)\b/, 0.1],
    ],
  },
  {
    language: "python",
    cap: 0.95,
    signals: [
      [/\bdef\s+\w+\s*\(/, 0.4],
      [/^\s*(?:import|from)\s+[\w.]+/m, 0.2],
      [/\b(?:elif|None|self)\b/, 0.2],
      [/:\n/, 0.2],
      [/^ {4}\S/m, 0.1],
    ],
  },
  JAVASCRIPT,
  {
    language: "go",
    cap: 0.95,
    signals: [
      [/^package\s+\w+/m, 0.4],
      [/\bfunc\s+/, 0.2],
      [/:=/, 0.2],
      [/^import\s/m, 0.1],
      [/\bfmt\./, 0.1],
    ],
  },
  {
    language: "rust",
    cap: 0.95,
    signals: [
      [/\bfn\s+\w+/, 0.3],
      [/\blet mut\b|\bimpl\b/, 0.2],
      [/^use\s+[\w:]+/m, 0.1],
      [/::/, 0.2],
      [/println!/, 0.3],
    ],
  },
  {
    language: "java",
    cap: 0.95,
    signals: [
      [/\bpublic\s+class\b/, 0.5],
      [/\bstatic\s+void\s+main\b/, 0.3],
      [/\bSystem\.out\b/, 0.2],
    ],
  },
  {
    language: "cCpp",
    cap: 0.95,
    signals: [
      [/#include\s*[<"]/, 0.6],
      [/\bint\s+main\s*\(/, 0.2],
      [/\bstd::/, 0.2],
    ],
  },
  {
    language: "ruby",
    cap: 0.9,
    signals: [
      [/\bdef\s+\w+/, 0.3],
      [/^\s*end\s*$/m, 0.3],
      [/\bputs\s/, 0.2],
      [/\brequire\s+['"]/, 0.1],
    ],
  },
  {
    language: "sql",
    cap: 0.95,
    signals: [
      [/\bSELECT\s/i, 0.4],
      [/\bFROM\s/i, 0.2],
      [/\bWHERE\s/i, 0.2],
      [/\b(?:INSERT|UPDATE|DELETE)\s/i, 0.2],
      [/;/, 0.1],
    ],
  },
  {
    language: "shell",
    cap: 0.9,
    signals: [
      [/^#!\//, 0.5],
      [/^\s*export\s+\w+=/m, 0.4],
      [/\bset -e\b/, 0.2],
      [/\$\(|`/, 0.1],
      [/^\s*(?:cd|echo)\s/m, 0.2],
    ],
  },
];

const FENCED_BLOCK = /```([A-Za-z0-9_+-]+)?\n([\s\S]*?)```/g;
const CODE_TOKENS = ["{", "}", ";", "=>", "==", "!=", "()", "[]", ":=", "::", "#include", "import "];

function score({ signals, cap }: LanguageScore, code: string): number {
  let total = 0;
  for (const [pattern, weight] of signals) {
    if (pattern.test(code)) total += weight;
  }
  return Math.min(cap, total);
}

function typeScriptScore(code: string): number {
  let total = score(JAVASCRIPT, code) * 0.8;
  if (/\b(?:interface|type)\s+\w+/.test(code)) total += 0.4;
  if (/:\s*(?:number|string|boolean)\b/.test(code)) total += 0.3;
  if (/\bas\s+\w+/.test(code)) total += 0.1;
  return Math.min(0.95, total);
}

function jsonConfidence(code: string): number | null {
  const first = code.charAt(0);
  if (first !== "{" && first !== "[") return null;
  try {
    const value: unknown = JSON.parse(code);
    return typeof value === "object" && value !== null ? 0.95 : null;
  } catch {
    return null;
  }
}

function htmlConfidence(code: string): number {
  const lower = code.toLowerCase();
  if (lower.includes("<!doctype html") || lower.includes("<html")) return 0.95;
  if (lower.includes("<div") || lower.includes("<span") || lower.includes("</")) return 0.9;
  return 0;
}

const CSS_RULE = /([^{}]+)\{([^{}]*)\}/g;
const CSS_DECLARATION = /^-{0,2}[a-z][a-z0-9-]*\s*:\s*\S/;
const NOT_A_SELECTOR =
  /\b(?:interface|class|struct|enum|function|type|fn|func|if|else|for|while|const|let|var|return)\b|=>|;/;

// selector { property: value; }
function cssConfidence(code: string): number {
  let rules = 0;
  for (const m of code.matchAll(CSS_RULE)) {
    const selector = (m[1] ?? "").trim();
    const declarations = (m[2] ?? "")
      .split(";")
      .map((d) => d.trim())
      .filter((d) => d.length > 0);
    if (selector.length === 0 || NOT_A_SELECTOR.test(selector)) return 0;
    if (declarations.length === 0 || !declarations.every((d) => CSS_DECLARATION.test(d))) return 0;
    if (!(m[2] ?? "").includes(";")) return 0;
    rules++;
  }
  return rules > 0 ? 0.9 : 0;
}

function yamlScore(code: string): number {
  const lines = code.split("\n").filter((l) => l.trim().length > 0);
  if (lines.length < 2) return 0;
  let keyValue = 0;
  let hasList = false;
  for (const line of lines) {
    const l = line.trim();
    if (l.startsWith("- ")) hasList = true;
    if (/^[\w.-]+:(?:\s|$)/.test(l) && !l.includes("{") && !l.includes("}")) keyValue++;
  }
  if (keyValue < 2 || keyValue / lines.length < 0.5) return 0;
  return hasList ? 0.9 : 0.8;
}

function looksLikeCode(code: string): boolean {
  return code.includes("\n") || CODE_TOKENS.some((t) => code.includes(t));
}

export function classifyCode(code: string): CodeItem {
  const json = jsonConfidence(code);
  if (json !== null) return { language: "json", confidence: json };
  const html = htmlConfidence(code);
  if (html >= 0.9) return { language: "html", confidence: html };
  const css = cssConfidence(code);
  if (css >= 0.85) return { language: "css", confidence: css };

  if (!looksLikeCode(code)) return { language: "unknown", confidence: 0 };

  const candidates: CodeItem[] = [
    ...LANGUAGES.map((l) => ({ language: l.language, confidence: score(l, code) })),
    { language: "typeScript", confidence: typeScriptScore(code) },
    { language: "yaml", confidence: yamlScore(code) },
  ];
  let best: CodeItem = { language: "unknown", confidence: 0 };
  for (const candidate of candidates) {
    if (candidate.confidence > best.confidence) best = candidate;
  }
  return best;
}

function candidates(text: string): Array<{ code: string; span: Span }> {
  const blocks: Array<{ code: string; span: Span }> = [];
  for (const m of text.matchAll(FENCED_BLOCK)) {
    const body = m[2];
    if (m.index === undefined || body === undefined) continue;
    const start = m.index + m[0].indexOf("\n") + 1;
    blocks.push({ code: body, span: { start, end: start + body.length } });
  }
  return blocks.length > 0 ? blocks : [{ code: text, span: { start: 0, end: text.length } }];
}

export const codeDetector: Detector<CodeItem> = {
  detect(text, ctx) {
    const seen = new Set<string>();
    const found: Detection<CodeItem>[] = [];

    for (const { code, span } of candidates(text)) {
      const trimmed = code.trim();
      if (trimmed.length === 0 || seen.has(trimmed)) continue;
      seen.add(trimmed);
      if (overlapsAny(span, ctx.ignoreSpans)) continue;

      const item = classifyCode(trimmed);
      if (item.confidence < ACCEPT_THRESHOLD) continue;
      found.push({ match: trimmed, span, item });
    }
    return found;
  },
};
