import { matchSpan, overlapsAny } from "../core/spans.js";
import type { Detection, Detector, HashKind } from "../core/types.js";
import type { HashItem } from "../metadata/schema.js";

const HASH_PATTERN =
  /(?<![0-9a-f])([0-9a-f]{128}|[0-9a-f]{96}|[0-9a-f]{64}|[0-9a-f]{56}|[0-9a-f]{40}|[0-9a-f]{32})(?![0-9a-f])/gi;

const KIND_BY_LENGTH: ReadonlyMap<number, { kind: HashKind; bits: number }> = new Map([
  [32, { kind: "md5", bits: 128 }],
  [40, { kind: "sha1", bits: 160 }],
  [56, { kind: "sha224", bits: 224 }],
  [64, { kind: "sha256", bits: 256 }],
  [96, { kind: "sha384", bits: 384 }],
  [128, { kind: "sha512", bits: 512 }],
]);

export const hashDetector: Detector<HashItem> = {
  detect(text, ctx) {
    const seen = new Set<string>();
    const found: Detection<HashItem>[] = [];

    for (const m of text.matchAll(HASH_PATTERN)) {
      const span = matchSpan(m, 1);
      const raw = m[1];
      if (!span || raw === undefined || overlapsAny(span, ctx.ignoreSpans)) continue;

      const hash = raw.toLowerCase();
      const kind = KIND_BY_LENGTH.get(hash.length);
      if (!kind || seen.has(hash)) continue;
      seen.add(hash);

      found.push({ match: raw, span, item: { hash, ...kind, confidence: 0.85 } });
    }
    return found;
  },
};
