/**
 * Metadata codec.
 *
 * Serializes the per-capture metadata document and answers the questions
 * downstream filters ask of it: does this record carry an email, what are
 * its URLs, give me up to N values of any kind.
 */

import { ContainmentCache } from "../cache/containment-cache.js";
import type { ContentType } from "../core/types.js";
import { formatAssignment } from "../detectors/env-var.js";
import { METADATA_KEYS, MetadataDocumentSchema, type MetadataDocument } from "./schema.js";

export type ExtractedValue = {
  type: ContentType;
  value: string;
  displayValue: string;
};

// ============================================================================
// Serialization
// ============================================================================

/** Compact JSON with a fixed key order. An empty document serializes to "". */
export function serializeMetadata(doc: MetadataDocument): string {
  const ordered: Record<string, unknown> = {};
  for (const key of METADATA_KEYS) {
    const value = doc[key];
    if (value === undefined) continue;
    if (Array.isArray(value) && value.length === 0) continue;
    ordered[key] = value;
  }
  return Object.keys(ordered).length === 0 ? "" : JSON.stringify(ordered);
}

/** Parse and validate a document. Returns null for anything that is not one. */
export function parseMetadata(json: string): MetadataDocument | null {
  if (json.trim().length === 0) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return null;
  }
  const parsed = MetadataDocumentSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

// ============================================================================
// Family lookup
// ============================================================================

/** Round-robin order used by extractAll. */
export const EXTRACT_ALL_ORDER = [
  "email",
  "url",
  "phoneNumber",
  "ipAddress",
  "uuid",
  "hash",
  "apiKey",
  "jwt",
  "envVar",
  "filePath",
  "shellCommand",
  "code",
] as const satisfies readonly ContentType[];

type FamilyRule = {
  bit: number;
  /** Substring every document carrying the family must contain. */
  marker: string;
  present: (doc: MetadataDocument) => boolean;
};

const FAMILY_RULES: ReadonlyMap<ContentType, FamilyRule> = new Map<ContentType, FamilyRule>([
  ["email", { bit: 1 << 0, marker: '"emails"', present: (d) => (d.emails?.length ?? 0) > 0 }],
  ["url", { bit: 1 << 1, marker: '"urls"', present: (d) => (d.urls?.length ?? 0) > 0 }],
  [
    "phoneNumber",
    { bit: 1 << 2, marker: '"phoneNumbers"', present: (d) => (d.phoneNumbers?.length ?? 0) > 0 },
  ],
  [
    "ipAddress",
    { bit: 1 << 3, marker: '"ipAddresses"', present: (d) => (d.ipAddresses?.length ?? 0) > 0 },
  ],
  ["uuid", { bit: 1 << 4, marker: '"uuids"', present: (d) => (d.uuids?.length ?? 0) > 0 }],
  ["hash", { bit: 1 << 5, marker: '"hashes"', present: (d) => (d.hashes?.length ?? 0) > 0 }],
  ["apiKey", { bit: 1 << 6, marker: '"apiKeys"', present: (d) => (d.apiKeys?.length ?? 0) > 0 }],
  ["jwt", { bit: 1 << 7, marker: '"jwt"', present: (d) => (d.jwt?.length ?? 0) > 0 }],
  ["envVar", { bit: 1 << 8, marker: '"env"', present: (d) => (d.env?.vars.length ?? 0) > 0 }],
  ["envVarBlock", { bit: 1 << 9, marker: '"isBlock":true', present: (d) => d.env?.isBlock === true }],
  [
    "filePath",
    { bit: 1 << 10, marker: '"filePaths"', present: (d) => (d.filePaths?.length ?? 0) > 0 },
  ],
  [
    "shellCommand",
    { bit: 1 << 11, marker: '"shellCommands"', present: (d) => (d.shellCommands?.length ?? 0) > 0 },
  ],
  ["code", { bit: 1 << 12, marker: '"code"', present: (d) => (d.code?.length ?? 0) > 0 }],
]);

function familyMask(doc: MetadataDocument): number {
  let mask = 0;
  for (const rule of FAMILY_RULES.values()) {
    if (rule.present(doc)) mask |= rule.bit;
  }
  return mask;
}

function valuesOf(type: ContentType, doc: MetadataDocument): ExtractedValue[] {
  switch (type) {
    case "email":
      return (doc.emails ?? []).map((e) => ({ type, value: e.email, displayValue: e.email }));
    case "url":
      return (doc.urls ?? []).map((u) => ({ type, value: u.url, displayValue: u.domain }));
    case "phoneNumber":
      return (doc.phoneNumbers ?? []).map((p) => ({ type, value: p.number, displayValue: p.number }));
    case "ipAddress":
      return (doc.ipAddresses ?? []).map((ip) => ({
        type,
        value: ip.address,
        displayValue: `${ip.address} (V${ip.version})`,
      }));
    case "uuid":
      return (doc.uuids ?? []).map((u) => ({ type, value: u.uuid, displayValue: u.uuid }));
    case "hash":
      return (doc.hashes ?? []).map((h) => ({
        type,
        value: h.hash,
        displayValue: `${h.kind.toUpperCase()}: ${h.hash}`,
      }));
    case "apiKey":
      return (doc.apiKeys ?? []).map((k) => ({
        type,
        value: k.key,
        displayValue: `${k.provider}: ${k.key}`,
      }));
    case "jwt":
      return (doc.jwt ?? []).map((t) => ({
        type,
        value: t.token,
        displayValue: t.isExpired === true ? "JWT (expired)" : "JWT",
      }));
    case "envVar":
    case "envVarBlock":
      if (type === "envVarBlock" && doc.env?.isBlock !== true) return [];
      return (doc.env?.vars ?? []).map((v) => {
        const assignment = formatAssignment({ ...v, isExported: false });
        return { type, value: assignment, displayValue: assignment };
      });
    case "filePath":
      return (doc.filePaths ?? []).map((f) => ({ type, value: f.path, displayValue: f.filename }));
    case "shellCommand":
      return (doc.shellCommands ?? []).map((c) => ({
        type,
        value: c.command,
        displayValue: `${c.executable}: ${c.command}`,
      }));
    case "code":
      return (doc.code ?? []).map((c) => ({ type, value: c.language, displayValue: c.language }));
    default:
      return [];
  }
}

// ============================================================================
// Codec
// ============================================================================

export class MetadataCodec {
  constructor(private readonly cache: ContainmentCache = new ContainmentCache(512)) {}

  /**
   * Whether the document carries at least one value of `type`. Documents
   * without the family's marker are rejected without parsing; otherwise the
   * family bitmask is computed once per cache key.
   */
  containsFamily(type: ContentType, document: string, cacheKey: string = document): boolean {
    const rule = FAMILY_RULES.get(type);
    if (!rule || !document.includes(rule.marker)) return false;

    let mask = this.cache.get(cacheKey);
    if (mask === undefined) {
      const doc = parseMetadata(document);
      mask = doc ? familyMask(doc) : 0;
      this.cache.set(cacheKey, mask);
    }
    return (mask & rule.bit) !== 0;
  }

  extractValues(type: ContentType, document: string, limit = Number.POSITIVE_INFINITY): ExtractedValue[] {
    if (limit <= 0) return [];
    const doc = parseMetadata(document);
    if (!doc) return [];
    return valuesOf(type, doc).slice(0, limit);
  }

  /** Interleave every family one value at a time until `limit` is reached. */
  extractAll(document: string, limit: number): ExtractedValue[] {
    const doc = parseMetadata(document);
    if (!doc || limit <= 0) return [];

    const queues = EXTRACT_ALL_ORDER.map((type) => valuesOf(type, doc)).filter((q) => q.length > 0);
    const out: ExtractedValue[] = [];
    for (let round = 0; out.length < limit; round++) {
      let progressed = false;
      for (const queue of queues) {
        const next = queue[round];
        if (next === undefined) continue;
        progressed = true;
        out.push(next);
        if (out.length >= limit) break;
      }
      if (!progressed) break;
    }
    return out;
  }

  countItems(type: ContentType, document: string): number {
    const doc = parseMetadata(document);
    return doc ? valuesOf(type, doc).length : 0;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
