import { inngest, SCAN_BATCH_EVENT, ScanBatchEvent } from "../client";
import { AssetIndex } from "../../lib/asset-index";
import { HttpClassifier } from "../../lib/classifier";
import {
  DEFAULT_PRECISION,
  DEFAULT_THRESHOLD,
  ScanConfig,
  loadConfig,
} from "../../lib/config";
import { PolicyDecisionProvider } from "../../lib/decisions";
import { eventClassLabel, resolveEventClasses } from "../../lib/event-classes";
import { MODEL_FRAMES_PER_SECOND } from "../../lib/events";
import { YtDlpFetcher } from "../../lib/fetcher";
import { ensureArray, ensureRecord, ensureString } from "../../lib/guards";
import { Ledger } from "../../lib/ledger";
import { ScanRequest, runScan } from "../../lib/pipeline";
import { S3ReportStore } from "../../lib/reports";
import { StorageClient } from "../../lib/storage";

type ScanPolicy = ScanBatchEvent["data"]["policy"];

const POLICIES: readonly ScanPolicy[] = [
  "PROCESS_ALL",
  "SKIP_LOGGED_PROCESS_NEW",
  "REDOWNLOAD_LOGGED_MISSING",
];

export interface ScanJob {
  policy: ScanPolicy;
  request: ScanRequest;
}

function isPolicy(value: string): value is ScanPolicy {
  return POLICIES.some((policy) => policy === value);
}

function optionalNumber(value: unknown, name: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Expected number for ${name}`);
  }
  return value;
}

/**
 * Validate an event payload and turn it into a scan request
 */
export function buildScanJob(payload: unknown, config: ScanConfig): ScanJob {
  const data = ensureRecord(payload, "event.data");

  const sources = ensureArray(data.sources, "sources").map((s, i) =>
    ensureString(s, `sources[${i}]`),
  );
  if (sources.length === 0) {
    throw new Error("sources must not be empty");
  }

  const policy = ensureString(data.policy, "policy");
  if (!isPolicy(policy)) {
    throw new Error(`Unknown policy ${policy}`);
  }

  const eventClasses =
    data.event_classes == null
      ? resolveEventClasses()
      : ensureArray(data.event_classes, "event_classes").map((code, i) => {
          const value = optionalNumber(code, `event_classes[${i}]`);
          if (value === undefined || !Number.isInteger(value) || value < 0) {
            throw new Error(`Invalid class code at event_classes[${i}]`);
          }
          return { code: value, label: eventClassLabel(value) };
        });

  const threshold = optionalNumber(data.threshold, "threshold") ?? DEFAULT_THRESHOLD;
  if (threshold < 0 || threshold > 100) {
    throw new Error(`Expected threshold between 0 and 100, got ${threshold}`);
  }
  const precision = optionalNumber(data.precision, "precision") ?? DEFAULT_PRECISION;
  if (!Number.isInteger(precision) || precision <= 0) {
    throw new Error(`Precision must be a positive integer, got ${precision}`);
  }

  return {
    policy,
    request: {
      sources,
      eventClasses,
      workDir: config.workDir,
      cookies: data.cookies == null ? undefined : ensureString(data.cookies, "cookies"),
      ffmpegPath: config.ffmpegPath,
      inference: {
        sampleRate: config.sampleRate,
        batchSize: config.batchSize,
        precision,
        threshold,
        modelFramesPerSecond: MODEL_FRAMES_PER_SECOND,
      },
    },
  };
}

/**
 * Unattended batch scan. One run at a time: the ledger has a single writer.
 */
export const scanBatch = inngest.createFunction(
  {
    id: "scan-batch",
    name: "Scan Media Batch",
    retries: 0,
    concurrency: {
      limit: 1,
    },
  },
  { event: SCAN_BATCH_EVENT },
  async ({ event, step }) => {
    const config = loadConfig();

    let job: ScanJob;
    try {
      job = buildScanJob(event.data, config);
    } catch (error) {
      console.error(
        JSON.stringify({
          scope: "scan_batch",
          status: "error",
          error_type: "validation",
          message: error instanceof Error ? error.message : String(error),
        }),
      );
      throw error;
    }

    console.log(
      JSON.stringify({
        scope: "scan_batch",
        status: "started",
        sources: job.request.sources.length,
        policy: job.policy,
        event_classes: job.request.eventClasses.map((c) => c.code),
      }),
    );

    // Prompts and progress live in the ledger, so the whole run is one step
    const summary = await step.run("run-scan", async () => {
      const reports = config.reportBucket
        ? new S3ReportStore(new StorageClient(config.reportBucket, config.awsRegion))
        : null;

      return runScan(job.request, {
        fetcher: new YtDlpFetcher({ workDir: config.workDir, binary: config.ytdlpPath }),
        classifier: new HttpClassifier({
          endpoint: config.classifierEndpoint,
          model: config.modelPath,
          timeoutMs: config.classifierTimeoutMs,
        }),
        decisions: new PolicyDecisionProvider({ policy: job.policy }),
        ledger: new Ledger(config.ledgerPath),
        assets: new AssetIndex(config.workDir),
        reports,
        output: (line) => {
          if (line) {
            console.log(JSON.stringify({ scope: "scan_batch", output: line }));
          }
        },
      });
    });

    console.log(
      JSON.stringify({
        scope: "scan_batch",
        status: summary.status,
        reason: summary.reason,
        inferenced: summary.counters.inferenced,
        failed: summary.counters.failed,
      }),
    );

    return summary;
  },
);
