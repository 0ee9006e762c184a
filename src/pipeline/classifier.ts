/**
 * Classification orchestrator.
 *
 * Decodes the capture and checks for an env block first; a block is split
 * into one entry per assignment without running any other family.
 * Otherwise every family detector runs in a fixed order, one primary
 * content type is picked and the metadata document is assembled together
 * with the extracted child items.
 */

import { resolveConfig, type ClassifierConfig, type ResolvedConfig } from "../config.js";
import type {
  ClassificationOutput,
  ContentType,
  DetectContext,
  Detection,
  Detector,
  DetectorFault,
  DetectorSet,
  EncodingResolution,
  ExtractedItem,
  Family,
  FamilyDetections,
  PathProbe,
  Span,
  SplitEntry,
} from "../core/types.js";
import { DEFAULT_DETECTORS } from "../detectors/index.js";
import { formatAssignment, isEnvBlock } from "../detectors/env-var.js";
import { createStatProbe, noFileSystemProbe } from "../detectors/file-path.js";
import { createLogger, type Logger } from "../logger.js";
import { serializeMetadata } from "../metadata/codec.js";
import type { EncodingSection, EnvVarItem, MetadataDocument } from "../metadata/schema.js";
import { resolveEncoding } from "./encoding.js";
import {
  ENV_BLOCK_THRESHOLD,
  FAMILY_TYPES,
  MIN_CLASSIFIABLE_LENGTH,
  PRIMARY_PRIORITY,
  SUPPRESSORS,
  TEXT_FALLBACK_CONFIDENCE,
  type PrimaryCandidate,
} from "./priority.js";

const DECODED_PREVIEW_LENGTH = 200;

export type CaptureKind = "text" | "image" | "screenshot";

export type ClassifyInput = {
  content: string;
  kind?: CaptureKind;
};

export type ClassifierDeps = {
  logger?: Logger;
  /** Replace individual family detectors. */
  detectors?: Partial<DetectorSet>;
  /** Existence check for file paths; ignored when checkFileExistence is off. */
  probe?: PathProbe;
};

type FamilyRunner = <T extends { confidence: number }>(
  family: Family,
  detector: Detector<T>,
) => Promise<Detection<T>[]>;

type ChildCandidate = {
  family: Family;
  content: string;
  confidence: number;
  document: MetadataDocument;
};

type Primary = {
  type: ContentType;
  family: Family | null;
  confidence: number;
};

function bestConfidence(detections: readonly Detection<{ confidence: number }>[]): number {
  let best = 0;
  for (const d of detections) best = Math.max(best, d.item.confidence);
  return best;
}

function encodingSection(resolution: EncodingResolution): EncodingSection {
  const [first] = resolution.steps;
  return {
    encoding: resolution.steps.length === 1 && first !== undefined ? first : "nested",
    steps: resolution.steps,
    decodedPreview: resolution.decoded.slice(0, DECODED_PREVIEW_LENGTH),
  };
}

function emptyOutput(primaryType: ContentType, confidence: number): ClassificationOutput {
  return {
    primaryType,
    confidence,
    metadata: "",
    splitEntries: [],
    extractedItems: [],
    decoded: null,
    faults: [],
  };
}

/** The metadata document for the given families. */
function buildDocument(
  results: FamilyDetections,
  include: (family: Family) => boolean,
): MetadataDocument {
  const doc: MetadataDocument = {};
  const items = <T extends { confidence: number }>(
    family: Family,
    ds: readonly Detection<T>[],
  ): T[] | undefined => (include(family) && ds.length > 0 ? ds.map((d) => d.item) : undefined);

  const emails = items("email", results.email);
  if (emails) doc.emails = emails;
  const urls = items("url", results.url);
  if (urls) doc.urls = urls;
  const phoneNumbers = items("phoneNumber", results.phoneNumber);
  if (phoneNumbers) doc.phoneNumbers = phoneNumbers;
  const ipAddresses = items("ipAddress", results.ipAddress);
  if (ipAddresses) doc.ipAddresses = ipAddresses;
  const uuids = items("uuid", results.uuid);
  if (uuids) doc.uuids = uuids;
  const hashes = items("hash", results.hash);
  if (hashes) doc.hashes = hashes;
  const apiKeys = items("apiKey", results.apiKey);
  if (apiKeys) doc.apiKeys = apiKeys;
  const jwt = items("jwt", results.jwt);
  if (jwt) doc.jwt = jwt;
  const vars = items("env", results.env);
  if (vars) doc.env = { isBlock: false, vars };
  const filePaths = items("filePath", results.filePath);
  if (filePaths) doc.filePaths = filePaths;
  const shellCommands = items("shellCommand", results.shellCommand);
  if (shellCommands) doc.shellCommands = shellCommands;

  const code = items("code", results.code);
  if (code) doc.code = code;
  if (include("prose")) {
    const prose = results.prose[0];
    if (prose) doc.prose = prose.item;
  }
  return doc;
}

/** One candidate per detection of an extractable family, each with its own document. */
function childCandidates(results: FamilyDetections): ChildCandidate[] {
  const child = (family: Family, content: string, confidence: number, document: MetadataDocument) => ({
    family,
    content,
    confidence,
    document,
  });
  return [
    ...results.email.map((d) => child("email", d.item.email, d.item.confidence, { emails: [d.item] })),
    ...results.url.map((d) => child("url", d.item.url, d.item.confidence, { urls: [d.item] })),
    ...results.phoneNumber.map((d) =>
      child("phoneNumber", d.item.number, d.item.confidence, { phoneNumbers: [d.item] }),
    ),
    ...results.ipAddress.map((d) =>
      child("ipAddress", d.item.address, d.item.confidence, { ipAddresses: [d.item] }),
    ),
    ...results.uuid.map((d) => child("uuid", d.item.uuid, d.item.confidence, { uuids: [d.item] })),
    ...results.hash.map((d) => child("hash", d.item.hash, d.item.confidence, { hashes: [d.item] })),
    ...results.apiKey.map((d) => child("apiKey", d.item.key, d.item.confidence, { apiKeys: [d.item] })),
    ...results.jwt.map((d) => child("jwt", d.item.token, d.item.confidence, { jwt: [d.item] })),
    ...results.env.map((d) =>
      child("env", formatAssignment(d.item), d.item.confidence, {
        env: { isBlock: false, vars: [d.item] },
      }),
    ),
    ...results.filePath.map((d) =>
      child("filePath", d.item.path, d.item.confidence, { filePaths: [d.item] }),
    ),
    ...results.shellCommand.map((d) =>
      child("shellCommand", d.item.command, d.item.confidence, { shellCommands: [d.item] }),
    ),
  ];
}

export class ContentClassifier {
  readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly detectors: DetectorSet;
  private readonly probe: PathProbe;

  constructor(config: ClassifierConfig = {}, deps: ClassifierDeps = {}) {
    this.config = resolveConfig(config);
    this.logger = deps.logger ?? createLogger({ level: this.config.logLevel });
    this.detectors = { ...DEFAULT_DETECTORS, ...deps.detectors };
    this.probe = !this.config.checkFileExistence
      ? noFileSystemProbe
      : (deps.probe ?? createStatProbe(this.config.filePathProbeTimeoutMs));
  }

  async classify(input: string | ClassifyInput): Promise<ClassificationOutput> {
    const request: ClassifyInput = typeof input === "string" ? { content: input } : input;
    const kind = request.kind ?? "text";
    if (kind === "image" || kind === "screenshot") return emptyOutput(kind, 1);

    const trimmed = request.content.trim();
    if (trimmed.length === 0) return emptyOutput("unknown", 0);

    let scanned = trimmed;
    if (trimmed.length > this.config.maxScanLength) {
      scanned = trimmed.slice(0, this.config.maxScanLength);
      this.logger.debug({ length: trimmed.length, scanned: scanned.length }, "capture truncated for analysis");
    }

    const resolution = resolveEncoding(scanned, { maxDepth: this.config.maxDecodeDepth });
    const decoded = resolution.steps.length > 0 ? resolution : null;
    if (decoded) this.logger.debug({ steps: decoded.steps }, "decoded capture");

    const text = decoded ? decoded.decoded.trim() : scanned;
    if (text.length < MIN_CLASSIFIABLE_LENGTH) {
      return { ...emptyOutput("unknown", 0), decoded };
    }

    const faults: DetectorFault[] = [];
    const run = this.familyRunner(text, faults);
    const encoding = decoded ? encodingSection(decoded) : undefined;

    const env = await run("env", this.detectors.env);
    const envConfidence = bestConfidence(env);
    if (isEnvBlock(env) && envConfidence >= ENV_BLOCK_THRESHOLD) {
      return this.splitOutput(env, envConfidence, encoding, decoded, faults);
    }

    const results = await this.detectRest(run, env);
    const primary = this.selectPrimary(results);

    const include = (family: Family) => this.config.extractContent || family === primary.family;
    const doc = buildDocument(results, include);
    if (encoding) doc.encoding = encoding;

    const extractedItems = this.config.extractContent ? this.extractItems(results, primary) : [];
    if (extractedItems.length > 0) {
      this.logger.debug({ primaryType: primary.type, count: extractedItems.length }, "extracted items");
    }

    return {
      primaryType: primary.type,
      confidence: primary.confidence,
      metadata: serializeMetadata(doc),
      splitEntries: [],
      extractedItems,
      decoded,
      faults,
    };
  }

  /**
   * Runs one family inside an isolation wrapper. A throwing detector is
   * logged, recorded as a fault and treated as finding nothing. Spans each
   * family finds are withheld from the families it suppresses.
   */
  private familyRunner(text: string, faults: DetectorFault[]): FamilyRunner {
    const claimed = new Map<Family, Span[]>();
    const base: Omit<DetectContext, "ignoreSpans"> = {
      now: this.config.now,
      homeDir: this.config.homeDir,
      probe: this.probe,
    };

    return async <T extends { confidence: number }>(
      family: Family,
      detector: Detector<T>,
    ): Promise<Detection<T>[]> => {
      const ignoreSpans = SUPPRESSORS[family].flatMap((s) => claimed.get(s) ?? []);
      try {
        const found = await detector.detect(text, { ...base, ignoreSpans });
        claimed.set(family, found.map((d) => d.span));
        return found;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn({ family, err }, "detector failed");
        faults.push({ family, message });
        return [];
      }
    };
  }

  /**
   * Every family but env, in a fixed order so spans claimed by earlier
   * families can be withheld from later ones: jwt, url, email, uuid,
   * ipAddress, apiKey, hash, phoneNumber, filePath, shellCommand, code, prose.
   */
  private async detectRest(run: FamilyRunner, env: Detection<EnvVarItem>[]): Promise<FamilyDetections> {
    const d = this.detectors;
    const jwt = await run("jwt", d.jwt);
    const url = await run("url", d.url);
    const email = await run("email", d.email);
    const uuid = await run("uuid", d.uuid);
    const ipAddress = await run("ipAddress", d.ipAddress);
    const apiKey = await run("apiKey", d.apiKey);
    const hash = await run("hash", d.hash);
    const phoneNumber = await run("phoneNumber", d.phoneNumber);
    const filePath = await run("filePath", d.filePath);
    const shellCommand = await run("shellCommand", d.shellCommand);
    const code = await run("code", d.code);
    const prose = await run("prose", d.prose);

    return { jwt, url, email, uuid, ipAddress, apiKey, hash, phoneNumber, filePath, env, shellCommand, code, prose };
  }

  /** Split captures never get here, so envVarBlock is not a candidate. */
  private selectPrimary(results: FamilyDetections): Primary {
    const accepts = (candidate: PrimaryCandidate): boolean => {
      if (candidate.type === "envVarBlock") return false;
      if (candidate.type === "envVar" && isEnvBlock(results.env)) return false;
      return bestConfidence(results[candidate.family]) >= candidate.threshold;
    };

    const chosen = PRIMARY_PRIORITY.find(accepts);
    if (!chosen) return { type: "text", family: null, confidence: TEXT_FALLBACK_CONFIDENCE };
    return {
      type: chosen.type,
      family: chosen.family,
      confidence: bestConfidence(results[chosen.family]),
    };
  }

  private splitOutput(
    env: Detection<EnvVarItem>[],
    confidence: number,
    encoding: EncodingSection | undefined,
    decoded: EncodingResolution | null,
    faults: DetectorFault[],
  ): ClassificationOutput {
    const splitEntries = env.map((d): SplitEntry => ({
      content: formatAssignment(d.item),
      contentType: "envVar",
      confidence: d.item.confidence,
      metadata: serializeMetadata({ env: { isBlock: false, vars: [d.item] } }),
    }));
    this.logger.debug({ count: splitEntries.length }, "split env block");

    const doc: MetadataDocument = { env: { isBlock: true, vars: env.map((d) => d.item) } };
    if (encoding) doc.encoding = encoding;

    return {
      primaryType: "envVarBlock",
      confidence,
      metadata: serializeMetadata(doc),
      splitEntries,
      extractedItems: [],
      decoded,
      faults,
    };
  }

  private extractItems(results: FamilyDetections, primary: Primary): ExtractedItem[] {
    const candidates = childCandidates(results);
    const primaryCount = candidates.filter((c) => c.family === primary.family).length;

    return candidates
      .filter((c) => c.family !== primary.family || primaryCount > 1)
      .slice(0, this.config.maxExtractedItems)
      .map((c) => ({
        content: c.content,
        contentType: FAMILY_TYPES[c.family],
        confidence: c.confidence,
        metadata: serializeMetadata(c.document),
      }));
  }
}
