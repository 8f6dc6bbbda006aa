import {
  BatchPolicy,
  RetryEntry,
  RunCounters,
  RunMode,
} from "../types/pipeline";

/**
 * Mutable state of one scan run, passed explicitly to every stage.
 * Sticky flags start false and, once set, stay set for the rest of the run.
 */
export interface RunContext {
  mode: RunMode;
  policy: BatchPolicy | null;
  // Deliberate re-run of a fully processed batch: no per-item reinfer prompts
  fullRerun: boolean;
  skipAll: boolean;
  useExistingAll: boolean;
  cookies?: string;
  counters: RunCounters;
  retryList: RetryEntry[];
}

export function createRunContext(
  mode: RunMode,
  cookies?: string,
): RunContext {
  return {
    mode,
    policy: null,
    fullRerun: false,
    skipAll: false,
    useExistingAll: false,
    cookies,
    counters: {
      total: 0,
      inferenced: 0,
      existingFilesUsed: 0,
      newDownloads: 0,
      skipped: 0,
      failed: 0,
    },
    retryList: [],
  };
}
