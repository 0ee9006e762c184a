import { matchSpan, overlapsAny } from "../core/spans.js";
import type { Detection, Detector, UuidVariant } from "../core/types.js";
import type { UuidItem } from "../metadata/schema.js";

const UUID_PATTERN =
  /(?<![0-9a-f-])([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})(?![0-9a-f-])/gi;

function variantOf(nibble: string): UuidVariant {
  const value = parseInt(nibble, 16);
  if (Number.isNaN(value)) return "unknown";
  if (value <= 0x7) return "ncs";
  if (value <= 0xb) return "rfc4122";
  if (value <= 0xd) return "microsoft";
  return "future";
}

export const uuidDetector: Detector<UuidItem> = {
  detect(text, ctx) {
    const seen = new Set<string>();
    const found: Detection<UuidItem>[] = [];

    for (const m of text.matchAll(UUID_PATTERN)) {
      const span = matchSpan(m, 1);
      const raw = m[1];
      if (!span || raw === undefined || overlapsAny(span, ctx.ignoreSpans)) continue;

      const uuid = raw.toLowerCase();
      if (seen.has(uuid)) continue;
      seen.add(uuid);

      const version = parseInt(uuid.charAt(14), 16);
      const item: UuidItem = { uuid, variant: variantOf(uuid.charAt(19)), confidence: 0.9 };
      if (!Number.isNaN(version)) item.version = version;
      found.push({ match: raw, span, item });
    }
    return found;
  },
};
