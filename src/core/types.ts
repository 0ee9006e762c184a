/**
 * Core type definitions for clipsift.
 * Closed content-type taxonomy, detector families, spans and the
 * classification output shapes handed to the record store.
 */

import type {
  ApiKeyItem,
  CodeItem,
  EmailItem,
  EnvVarItem,
  FilePathItem,
  HashItem,
  IpAddressItem,
  JwtItem,
  PhoneNumberItem,
  ProseItem,
  ShellCommandItem,
  UrlItem,
  UuidItem,
} from "../metadata/schema.js";

export const CONTENT_TYPES = [
  "text",
  "email",
  "phoneNumber",
  "ipAddress",
  "uuid",
  "hash",
  "jwt",
  "apiKey",
  "envVar",
  "envVarBlock",
  "prose",
  "image",
  "screenshot",
  "filePath",
  "url",
  "code",
  "shellCommand",
  "unknown",
] as const;
export type ContentType = (typeof CONTENT_TYPES)[number];

export const CODE_LANGUAGES = [
  "swift",
  "python",
  "javaScript",
  "typeScript",
  "go",
  "rust",
  "java",
  "cCpp",
  "ruby",
  "sql",
  "json",
  "yaml",
  "html",
  "css",
  "shell",
  "unknown",
] as const;
export type CodeLanguage = (typeof CODE_LANGUAGES)[number];

export const FILE_TYPES = [
  "image",
  "video",
  "audio",
  "document",
  "code",
  "archive",
  "data",
  "executable",
  "font",
  "other",
] as const;
export type FileType = (typeof FILE_TYPES)[number];

export const UUID_VARIANTS = ["ncs", "rfc4122", "microsoft", "future", "unknown"] as const;
export type UuidVariant = (typeof UUID_VARIANTS)[number];

export const HASH_KINDS = ["md5", "sha1", "sha224", "sha256", "sha384", "sha512"] as const;
export type HashKind = (typeof HASH_KINDS)[number];

export const ENCODINGS = ["url", "base64"] as const;
export type Encoding = (typeof ENCODINGS)[number];

/** Half-open UTF-16 offsets into the analysed text. */
export type Span = {
  start: number;
  end: number;
};

/** One finding of a family detector. `item` is what ends up in metadata. */
export type Detection<T extends { confidence: number }> = {
  match: string;
  span: Span;
  item: T;
};

/** Payload type produced by each detector family. */
export type FamilyItems = {
  jwt: JwtItem;
  url: UrlItem;
  email: EmailItem;
  uuid: UuidItem;
  ipAddress: IpAddressItem;
  apiKey: ApiKeyItem;
  hash: HashItem;
  phoneNumber: PhoneNumberItem;
  filePath: FilePathItem;
  env: EnvVarItem;
  shellCommand: ShellCommandItem;
  code: CodeItem;
  prose: ProseItem;
};
export type Family = keyof FamilyItems;

export type FamilyDetections = {
  [F in Family]: Detection<FamilyItems[F]>[];
};

/** Context handed to every detector call. */
export type DetectContext = {
  now: () => Date;
  /** Spans already claimed by higher-priority families. */
  ignoreSpans: readonly Span[];
  homeDir: string;
  probe: PathProbe;
};

/** Resolves whether an absolute path exists. Must never reject. */
export type PathProbe = (absolutePath: string) => Promise<boolean>;

export interface Detector<T extends { confidence: number }> {
  detect(text: string, ctx: DetectContext): Detection<T>[] | Promise<Detection<T>[]>;
}

export type DetectorSet = {
  [F in Family]: Detector<FamilyItems[F]>;
};

export type EncodingResolution = {
  original: string;
  decoded: string;
  steps: Encoding[];
  confidence: number;
};

/** An independent record produced instead of an enriched one (env blocks). */
export type SplitEntry = {
  content: string;
  contentType: ContentType;
  confidence: number;
  metadata: string;
};

/** A sub-entity that becomes a child record linked to its parent. */
export type ExtractedItem = {
  content: string;
  contentType: ContentType;
  confidence: number;
  metadata: string;
};

export type DetectorFault = {
  family: Family;
  message: string;
};

export type ClassificationOutput = {
  primaryType: ContentType;
  confidence: number;
  /** Serialized metadata document; empty string when nothing was found. */
  metadata: string;
  splitEntries: SplitEntry[];
  extractedItems: ExtractedItem[];
  /** Decode chain applied before classification, if any. */
  decoded: EncodingResolution | null;
  faults: DetectorFault[];
};
