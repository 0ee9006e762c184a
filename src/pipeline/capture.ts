/**
 * Capture enrichment: turns one clipboard capture into the records a host
 * stores. Either a primary record with linked children, or N independent
 * split records for an env block, never both.
 */

import { randomUUID } from "node:crypto";
import type { ClassificationOutput, ContentType } from "../core/types.js";
import { decodeUtf8 } from "../core/text.js";
import type { CaptureKind, ContentClassifier } from "./classifier.js";

export type CaptureInput = {
  content?: string;
  /** Raw clipboard bytes; decoded as UTF-8 when `content` is absent. */
  bytes?: Uint8Array;
  kind?: CaptureKind;
  sourceApp?: string;
  timestamp?: Date;
};

export type ClipboardRecord = {
  id: string;
  content: string;
  contentType: ContentType;
  confidence: number;
  timestamp: Date;
  sourceApp?: string;
  metadata: string;
  parentEntryId?: string;
  /** Text handed to the host's full-text index. */
  searchText: string;
};

export type CaptureMode = "enriched" | "split" | "binary";

export type CaptureResult = {
  mode: CaptureMode;
  /** Records to store, primary first. */
  records: ClipboardRecord[];
  /** The primary record, or null in split mode or when it was skipped. */
  primary: ClipboardRecord | null;
  /** Records dropped because of skipApiKeys. */
  skipped: number;
  output: ClassificationOutput | null;
};

export type EnrichOptions = {
  skipApiKeys?: boolean;
  /** Id generator, for deterministic tests. */
  newId?: () => string;
};

function binaryRecord(
  contentType: ContentType,
  capture: CaptureInput,
  timestamp: Date,
  newId: () => string,
): ClipboardRecord {
  const record: ClipboardRecord = {
    id: newId(),
    content: "",
    contentType,
    confidence: contentType === "unknown" ? 0 : 1,
    timestamp,
    metadata: "",
    searchText: "",
  };
  if (capture.sourceApp !== undefined) record.sourceApp = capture.sourceApp;
  return record;
}

export async function enrichCapture(
  capture: CaptureInput,
  classifier: ContentClassifier,
  options: EnrichOptions = {},
): Promise<CaptureResult> {
  const skipApiKeys = options.skipApiKeys ?? classifier.config.skipApiKeys;
  const newId = options.newId ?? randomUUID;
  const timestamp = capture.timestamp ?? new Date();
  const kind = capture.kind ?? "text";

  if (kind === "image" || kind === "screenshot") {
    const record = binaryRecord(kind, capture, timestamp, newId);
    return { mode: "binary", records: [record], primary: record, skipped: 0, output: null };
  }

  const content = capture.content ?? (capture.bytes ? decodeUtf8(capture.bytes) : "");
  if (content === null) {
    const record = binaryRecord("unknown", capture, timestamp, newId);
    return { mode: "binary", records: [record], primary: record, skipped: 0, output: null };
  }

  const output = await classifier.classify({ content, kind });
  const makeRecord = (
    recordContent: string,
    contentType: ContentType,
    confidence: number,
    metadata: string,
    searchText: string,
    parentEntryId?: string,
  ): ClipboardRecord => {
    const record: ClipboardRecord = {
      id: newId(),
      content: recordContent,
      contentType,
      confidence,
      timestamp,
      metadata,
      searchText,
    };
    if (capture.sourceApp !== undefined) record.sourceApp = capture.sourceApp;
    if (parentEntryId !== undefined) record.parentEntryId = parentEntryId;
    return record;
  };

  const keep = (record: ClipboardRecord): boolean => !(skipApiKeys && record.contentType === "apiKey");

  if (output.splitEntries.length > 0) {
    const all = output.splitEntries.map((e) =>
      makeRecord(e.content, e.contentType, e.confidence, e.metadata, e.content),
    );
    const records = all.filter(keep);
    return { mode: "split", records, primary: null, skipped: all.length - records.length, output };
  }

  const searchText = output.decoded ? output.decoded.decoded : content;
  const primary = makeRecord(content, output.primaryType, output.confidence, output.metadata, searchText);
  const children = output.extractedItems.map((item) =>
    makeRecord(item.content, item.contentType, item.confidence, item.metadata, item.content, primary.id),
  );

  const all = [primary, ...children];
  const records = all.filter(keep);
  return {
    mode: "enriched",
    records,
    primary: keep(primary) ? primary : null,
    skipped: all.length - records.length,
    output,
  };
}
