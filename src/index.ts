/**
 * clipsift: content classification and extraction for clipboard captures.
 *
 * @example
 * ```typescript
 * import { createClassifier } from "clipsift"
 *
 * const sift = createClassifier({ extractContent: true })
 *
 * const out = await sift.classify("ping 192.168.1.5")
 * // out.primaryType === "ipAddress"
 *
 * const { records } = await sift.enrich({ content: "FOO=1\nBAR=2", sourceApp: "Terminal" })
 * // two independent envVar records
 *
 * sift.codec.containsFamily("ipAddress", out.metadata) // true
 * ```
 */

export type { ClassifierConfig, ResolvedConfig } from "./config.js";
export { resolveConfig } from "./config.js";
export { createLogger, LOG_LEVELS } from "./logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./logger.js";

export type {
  ContentType,
  CodeLanguage,
  FileType,
  UuidVariant,
  HashKind,
  Encoding,
  Span,
  Detection,
  Detector,
  DetectorSet,
  DetectContext,
  Family,
  FamilyItems,
  FamilyDetections,
  PathProbe,
  EncodingResolution,
  SplitEntry,
  ExtractedItem,
  DetectorFault,
  ClassificationOutput,
} from "./core/types.js";
export { CONTENT_TYPES, CODE_LANGUAGES, FILE_TYPES, UUID_VARIANTS, HASH_KINDS, ENCODINGS } from "./core/types.js";

export type {
  EmailItem,
  UrlItem,
  PhoneNumberItem,
  IpAddressItem,
  UuidItem,
  HashItem,
  ApiKeyItem,
  JwtClaims,
  JwtItem,
  EnvVarItem,
  EnvSection,
  FilePathItem,
  ShellCommandItem,
  CodeItem,
  ProseItem,
  EncodingSection,
  MetadataDocument,
  MetadataKey,
} from "./metadata/schema.js";
export { MetadataDocumentSchema, METADATA_KEYS } from "./metadata/schema.js";
export { MetadataCodec, serializeMetadata, parseMetadata, EXTRACT_ALL_ORDER } from "./metadata/codec.js";
export type { ExtractedValue } from "./metadata/codec.js";
export { ContainmentCache } from "./cache/containment-cache.js";

export * from "./detectors/index.js";
export * from "./pipeline/index.js";

// Factory
import { resolveConfig, type ClassifierConfig, type ResolvedConfig } from "./config.js";
import type { ClassificationOutput } from "./core/types.js";
import { ContainmentCache } from "./cache/containment-cache.js";
import { MetadataCodec } from "./metadata/codec.js";
import { ContentClassifier, type ClassifierDeps, type ClassifyInput } from "./pipeline/classifier.js";
import { enrichCapture, type CaptureInput, type CaptureResult, type EnrichOptions } from "./pipeline/capture.js";

/** A configured classifier with its metadata codec. */
export interface Clipsift {
  classify(input: string | ClassifyInput): Promise<ClassificationOutput>;
  enrich(capture: CaptureInput, options?: EnrichOptions): Promise<CaptureResult>;
  readonly codec: MetadataCodec;
  readonly config: ResolvedConfig;
}

export function createClassifier(cfg: ClassifierConfig = {}, deps: ClassifierDeps = {}): Clipsift {
  const config = resolveConfig(cfg);
  const classifier = new ContentClassifier(config, deps);
  const codec = new MetadataCodec(new ContainmentCache(config.containmentCacheSize));

  return {
    classify: (input) => classifier.classify(input),
    enrich: (capture, options) => enrichCapture(capture, classifier, options),
    codec,
    config,
  };
}
