/**
 * File-system path detection.
 *
 * Windows drive paths, POSIX absolute, relative and home-relative paths.
 * Existence is checked through the injected probe, which is the only I/O
 * the classifier ever performs.
 */

import { stat } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { mapWithConcurrency } from "../core/concurrency.js";
import { loadDataFile } from "../core/data.js";
import { overlapsAny } from "../core/spans.js";
import { trimChars, trimTrailing } from "../core/text.js";
import { FILE_TYPES } from "../core/types.js";
import type { Detection, Detector, FileType, PathProbe, Span } from "../core/types.js";
import type { FilePathItem } from "../metadata/schema.js";

const FileTypeTableSchema = z.object({
  classes: z.array(z.object({ fileType: z.enum(FILE_TYPES), extensions: z.array(z.string()) })),
  mimeTypes: z.record(z.string()),
});

const FILE_TYPE_TABLE = loadDataFile("file-types.json", FileTypeTableSchema);
const CLASSES = FILE_TYPE_TABLE.classes.map(({ fileType, extensions }) => ({
  fileType,
  extensions: new Set(extensions),
}));
const MIME_TYPES = new Map(Object.entries(FILE_TYPE_TABLE.mimeTypes));

/** Existence checks in flight per capture. */
export const PROBE_CONCURRENCY = 8;

const WINDOWS_PATH = /(?<![A-Z0-9_])([A-Z]:\\[^\s"'<>|]+|[A-Z]:\/[^\s"'<>|]+)/gi;
const UNIX_PATH = /(?<![A-Za-z]:)(?<![A-Za-z0-9_\-/.~])((?:~|\.{1,2})?\/[^\s"']+)/g;

const LEADING_PUNCTUATION = "([{<\"'";
const TRAILING_PUNCTUATION = ",.;:)]}>\"'";

export function classifyFileType(extension: string | undefined): FileType {
  if (!extension) return "other";
  const ext = extension.toLowerCase();
  return CLASSES.find((c) => c.extensions.has(ext))?.fileType ?? "other";
}

export function mimeTypeFor(extension: string | undefined): string | undefined {
  return extension ? MIME_TYPES.get(extension.toLowerCase()) : undefined;
}

/**
 * Default probe: `stat` raced against a timeout. A probe that runs out of
 * time reports the path as missing.
 */
export function createStatProbe(timeoutMs: number): PathProbe {
  return async (target) => {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([
        stat(target).then(
          () => true,
          () => false,
        ),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  };
}

export const noFileSystemProbe: PathProbe = async () => false;

type Candidate = {
  raw: string;
  span: Span;
  windows: boolean;
};

function collect(text: string, pattern: RegExp, windows: boolean, ignore: readonly Span[]): Candidate[] {
  const out: Candidate[] = [];
  for (const m of text.matchAll(pattern)) {
    if (m.index === undefined) continue;
    const matched = m[0];
    const leading = trimChars(matched, LEADING_PUNCTUATION);
    const raw = trimTrailing(leading, TRAILING_PUNCTUATION);
    if (raw.length < 2) continue;
    const start = m.index + matched.indexOf(raw);
    const span = { start, end: start + raw.length };
    if (overlapsAny(span, ignore)) continue;
    out.push({ raw, span, windows });
  }
  return out;
}

type Described = {
  item: Omit<FilePathItem, "exists" | "confidence">;
  probeTarget: string;
};

function describe(candidate: Candidate, homeDir: string): Described {
  const { raw, windows } = candidate;
  const flavour = windows ? path.win32 : path.posix;
  const expanded = !windows && raw.startsWith("~/") ? path.posix.join(homeDir, raw.slice(2)) : raw;
  const filename = flavour.basename(expanded);
  const ext = flavour.extname(filename).slice(1).toLowerCase();
  const extension = ext.length > 0 ? ext : undefined;

  const item: Described["item"] = {
    path: expanded,
    filename,
    fileType: classifyFileType(extension),
  };
  if (extension !== undefined) item.extension = extension;
  const mimeType = mimeTypeFor(extension);
  if (mimeType !== undefined) item.mimeType = mimeType;

  const probeTarget = windows ? expanded.replace(/\\/g, "/") : path.resolve(expanded);
  return { item, probeTarget };
}

export const filePathDetector: Detector<FilePathItem> = {
  async detect(text, ctx) {
    const candidates = [
      ...collect(text, WINDOWS_PATH, true, ctx.ignoreSpans),
      ...collect(text, UNIX_PATH, false, ctx.ignoreSpans),
    ].sort((a, b) => a.span.start - b.span.start);

    const seen = new Set<string>();
    const unique = candidates.filter((c) => {
      if (seen.has(c.raw)) return false;
      seen.add(c.raw);
      return true;
    });

    return mapWithConcurrency(
      unique,
      PROBE_CONCURRENCY,
      async (candidate): Promise<Detection<FilePathItem>> => {
        const { item, probeTarget } = describe(candidate, ctx.homeDir);
        const exists = await ctx.probe(probeTarget);
        return {
          match: candidate.raw,
          span: candidate.span,
          item: { ...item, exists, confidence: exists ? 0.9 : 0.7 },
        };
      },
    );
  },
};
