import { Inngest } from "inngest";

type ScanBatchEvent = {
  name: "soundscan.batch.requested";
  data: {
    sources: string[];
    policy: "PROCESS_ALL" | "SKIP_LOGGED_PROCESS_NEW" | "REDOWNLOAD_LOGGED_MISSING";
    event_classes?: number[];
    threshold?: number;
    precision?: number;
    cookies?: string;
    requested_by?: string | null;
  };
};

export const SCAN_BATCH_EVENT = "soundscan.batch.requested";

export const inngest = new Inngest({
  id: "soundscan",
});

export type { ScanBatchEvent };
