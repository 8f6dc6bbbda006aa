/**
 * Shared types for the acquisition, reconciliation and inference pipeline
 */

export type Identifier = string;

export type RunMode = "single" | "batch";

export type SourceKind =
  | "explicit"
  | "list_file"
  | "playlist"
  | "channel"
  | "account_feed";

export interface MediaReference {
  identifier: Identifier;
  // Canonical URL, or the absolute path of a local file
  reference: string;
  local: boolean;
}

export interface ResolvedBatch {
  kind: SourceKind;
  mode: RunMode;
  source: string;
  references: MediaReference[];
}

export interface LedgerEntry {
  identifier: Identifier;
  reference: string;
  eventClass: number;
  processedAt: string;
  title: string;
}

export interface AssetRecord {
  identifier: Identifier;
  localPath: string;
}

export type Disposition =
  | "SKIP"
  | "REUSE_EXISTING"
  | "REDOWNLOAD_MISSING"
  | "DOWNLOAD_NEW"
  | "REINFER_EXISTING";

export type BatchPolicy =
  | "PROCESS_ALL"
  | "SKIP_LOGGED_PROCESS_NEW"
  | "REDOWNLOAD_LOGGED_MISSING"
  | "EXIT";

export interface EventClass {
  code: number;
  label: string;
}

export const BUILTIN_EVENT_CLASSES: readonly EventClass[] = [
  { code: 60, label: "farts" },
  { code: 58, label: "burps" },
] as const;

export interface EventDetection {
  timestampSeconds: number;
  confidencePercent: number;
}

export interface ReconciliationSummary {
  total: number;
  logged: number;
  cached: number;
  loggedButMissing: number;
  cachedButNotLogged: number;
  toProcess: number;
}

export interface ReconciledItem {
  ref: MediaReference;
  disposition: Disposition;
  logged: boolean;
  loggedClasses: number[];
  asset: AssetRecord | null;
}

export type ReconciliationOutcome =
  | {
      kind: "proceed";
      policy: BatchPolicy | null;
      fullRerun: boolean;
      summary: ReconciliationSummary;
      items: ReconciledItem[];
    }
  | {
      kind: "exit";
      reason: string;
      summary: ReconciliationSummary;
    };

export interface AcquiredAsset {
  path: string;
  title: string;
}

export interface ClassPassResult {
  eventClass: EventClass;
  frames: number;
  detections: EventDetection[];
}

export interface InferenceOptions {
  sampleRate: number;
  batchSize: number;
  precision: number;
  threshold: number;
  modelFramesPerSecond: number;
}

export interface RunCounters {
  total: number;
  inferenced: number;
  existingFilesUsed: number;
  newDownloads: number;
  skipped: number;
  failed: number;
}

export interface RetryEntry {
  reference: string;
  identifier: Identifier;
  error_type: "fetch" | "decode";
  message: string;
}

export interface RunSummary {
  status: "completed" | "exited";
  reason?: string;
  mode: RunMode;
  reconciliation: ReconciliationSummary | null;
  counters: RunCounters;
  retry: RetryEntry[];
  retry_file: string | null;
}
