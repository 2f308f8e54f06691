export type BoundaryMode = "join" | "split";

export interface WordBoundaryPolicy {
  apostrophes: BoundaryMode;
  hyphens: BoundaryMode;
}

export interface BionicOptions {
  minBoldFraction: number;
  excludedTags: Iterable<string>;
  wordBoundaryPolicy: WordBoundaryPolicy;
  emphasisTag: string;
}

export interface ResolvedOptions {
  minBoldFraction: number;
  excludedTags: ReadonlySet<string>;
  wordBoundaryPolicy: WordBoundaryPolicy;
  emphasisTag: string;
  // Tags treated as "already emphasized" when a run follows their close
  emphasisTags: ReadonlySet<string>;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;

export interface WordToken {
  start: number;
  end: number;
  /** Length in code points */
  length: number;
  text: string;
}

export type MarkupToken =
  | { type: "text"; raw: string; start: number }
  | { type: "openTag"; raw: string; start: number; name: string; selfClosing: boolean }
  | { type: "closeTag"; raw: string; start: number; name: string }
  | { type: "comment" | "cdata" | "instruction" | "declaration"; raw: string; start: number }
  | { type: "rawText"; raw: string; start: number; name: string }
  | { type: "malformed"; raw: string; start: number; reason: string };

export interface DocumentIssue {
  kind: "MalformedMarkup";
  offset: number;
  line?: number;
  message: string;
}

export interface WalkStats {
  textRuns: number;
  emboldenedRuns: number;
  excludedRuns: number;
}

export interface WalkResult {
  output: string;
  issues: DocumentIssue[];
  stats: WalkStats;
}

export type EntryKind = "markup" | "passthrough";

export interface PackageEntry {
  name: string;
  mediaType?: string;
  kind: EntryKind;
  dir: boolean;
}

export interface DocumentFailure {
  kind: "UnsupportedEncoding" | "MalformedMarkup";
  entryName: string;
  mediaType?: string;
  cause: string;
}

export type DocumentOutcome =
  | { status: "transformed"; data: Uint8Array; issues: DocumentIssue[]; stats: WalkStats }
  | { status: "failed"; failure: DocumentFailure };

export interface ConversionProgress {
  index: number;
  total: number;
  entryName: string;
  percent: number;
}

export type DocumentErrorPolicy = "skip" | "abort";

export interface ConvertOptions extends Partial<BionicOptions> {
  onDocumentError?: DocumentErrorPolicy;
  onProgress?: (progress: ConversionProgress) => void;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface ConversionReport {
  entries: number;
  transformed: number;
  passedThrough: number;
  failures: DocumentFailure[];
  issues: { entryName: string; issue: DocumentIssue }[];
  elapsedMs: number;
}
