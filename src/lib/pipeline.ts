/**
 * Scan pipeline driver
 *
 * Resolver -> reconciliation -> acquisition -> decoder -> inference ->
 * ledger, one identifier at a time. Each (identifier, class) pass is
 * appended to the ledger as soon as it finishes, so an interrupted run
 * keeps every completed pass.
 */

import { promises as fs } from "fs";
import path from "path";
import { AcquisitionCoordinator } from "./acquisition";
import { AssetIndex, AssetSnapshot } from "./asset-index";
import { Classifier } from "./classifier";
import { DecisionProvider } from "./decisions";
import { AudioDecoder, DecodedAudio, decodeAudio } from "./decoder";
import { DecodeError, errorMessage } from "./errors";
import { formatDetection } from "./events";
import { Fetcher } from "./fetcher";
import { runInference } from "./inference";
import { Ledger } from "./ledger";
import { reconcile } from "./reconcile";
import { resolveBatch } from "./references";
import { DetectionReport, ReportStore } from "./reports";
import { RunContext, createRunContext } from "./run-context";
import {
  AcquiredAsset,
  ClassPassResult,
  EventClass,
  InferenceOptions,
  MediaReference,
  ReconciledItem,
  ReconciliationSummary,
  RunSummary,
} from "../types/pipeline";

export const RETRY_FILE = "failed-urls.txt";

export type OutputWriter = (line: string) => void;

export const stdoutWriter: OutputWriter = (line) => {
  process.stdout.write(line + "\n");
};

export interface PipelineDeps {
  fetcher: Fetcher;
  classifier: Classifier;
  decisions: DecisionProvider;
  ledger: Ledger;
  assets: AssetIndex;
  decode?: AudioDecoder;
  reports?: ReportStore | null;
  output?: OutputWriter;
  now?: () => Date;
}

export interface ScanRequest {
  sources: string[];
  eventClasses: EventClass[];
  inference: InferenceOptions;
  workDir: string;
  cookies?: string;
  ffmpegPath?: string;
}

type WorkItem =
  | { kind: "local"; ref: MediaReference }
  | { kind: "tracked"; item: ReconciledItem };

export async function runScan(
  request: ScanRequest,
  deps: PipelineDeps,
): Promise<RunSummary> {
  const out = deps.output ?? stdoutWriter;
  const now = deps.now ?? (() => new Date());
  const startedAt = now().toISOString();

  const batch = await resolveBatch(request.sources, {
    fetcher: deps.fetcher,
    workDir: request.workDir,
    cookies: request.cookies,
  });

  const ctx = createRunContext(batch.mode, request.cookies);
  ctx.counters.total = batch.references.length;

  const tracked = batch.references.filter((ref) => !ref.local);
  const ledger = await deps.ledger.readSnapshot();
  const assets =
    tracked.length > 0
      ? await deps.assets.scan(tracked.map((ref) => ref.identifier))
      : new AssetSnapshot();

  const outcome = await reconcile(tracked, ledger, assets, batch.mode, deps.decisions);
  printReconciliation(out, outcome.summary);

  if (outcome.kind === "exit") {
    out(`Nothing to do (${outcome.reason.replace(/_/g, " ")}).`);
    const summary: RunSummary = {
      status: "exited",
      reason: outcome.reason,
      mode: batch.mode,
      reconciliation: outcome.summary,
      counters: ctx.counters,
      retry: [],
      retry_file: null,
    };
    await archiveSummary(deps.reports, startedAt, summary);
    return summary;
  }

  ctx.policy = outcome.policy;
  ctx.fullRerun = outcome.fullRerun;

  const byId = new Map(outcome.items.map((item) => [item.ref.identifier, item]));
  const work: WorkItem[] = [];
  for (const ref of batch.references) {
    const item = byId.get(ref.identifier);
    if (ref.local) {
      work.push({ kind: "local", ref });
    } else if (item) {
      work.push({ kind: "tracked", item });
    }
  }

  const acquisition = new AcquisitionCoordinator({
    fetcher: deps.fetcher,
    assets: deps.assets,
    decisions: deps.decisions,
    ledger,
    snapshot: assets,
  });

  console.log(
    JSON.stringify({
      scope: "pipeline",
      status: "started",
      mode: batch.mode,
      source_kind: batch.kind,
      total: batch.references.length,
      policy: ctx.policy,
      full_rerun: ctx.fullRerun,
      event_classes: request.eventClasses.map((c) => c.code),
    }),
  );

  try {
    for (const entry of work) {
      await processOne(entry, ctx, acquisition, request, deps, out, now);
    }
  } finally {
    // Written even when a single-item failure aborts the run
    await writeRetryFile(request.workDir, ctx);
  }

  const retryFile = ctx.retryList.length
    ? path.join(request.workDir, RETRY_FILE)
    : null;
  const summary: RunSummary = {
    status: "completed",
    mode: batch.mode,
    reconciliation: outcome.summary,
    counters: ctx.counters,
    retry: ctx.retryList,
    retry_file: retryFile,
  };

  printRunSummary(out, summary);
  console.log(
    JSON.stringify({
      scope: "pipeline",
      status: "completed",
      mode: batch.mode,
      ...ctx.counters,
      retry_count: ctx.retryList.length,
    }),
  );

  await archiveSummary(deps.reports, startedAt, summary);
  return summary;
}

async function processOne(
  entry: WorkItem,
  ctx: RunContext,
  acquisition: AcquisitionCoordinator,
  request: ScanRequest,
  deps: PipelineDeps,
  out: OutputWriter,
  now: () => Date,
): Promise<void> {
  const ref = entry.kind === "local" ? entry.ref : entry.item.ref;

  let asset: AcquiredAsset | null;
  if (entry.kind === "local") {
    asset = { path: ref.reference, title: path.basename(ref.reference) };
  } else {
    const failedBefore = ctx.counters.failed;
    asset = await acquisition.acquire(entry.item, ctx);
    if (!asset) {
      if (ctx.counters.failed === failedBefore) {
        ctx.counters.skipped++;
      }
      return;
    }
  }

  let audio: DecodedAudio;
  try {
    const decode = deps.decode ?? decodeAudio;
    audio = await decode(asset.path, {
      sampleRate: request.inference.sampleRate,
      chunkSamples: request.inference.batchSize,
      ffmpegPath: request.ffmpegPath,
    });
  } catch (error) {
    if (!(error instanceof DecodeError)) {
      throw error;
    }
    ctx.counters.failed++;
    ctx.retryList.push({
      reference: ref.reference,
      identifier: ref.identifier,
      error_type: "decode",
      message: error.message,
    });
    console.error(
      JSON.stringify({
        scope: "pipeline",
        status: "error",
        error_type: "decode",
        identifier: ref.identifier,
        asset: asset.path,
        mode: ctx.mode,
        message: error.message,
      }),
    );
    if (ctx.mode === "single") {
      throw error;
    }
    return;
  }

  const title = asset.title;
  out("");
  out(title);

  await runInference(
    audio,
    request.eventClasses,
    deps.classifier,
    request.inference,
    async (result) => {
      printDetections(out, result);

      if (!ref.local) {
        await deps.ledger.append({
          reference: ref.reference,
          eventClass: result.eventClass.code,
          title,
        });
      }

      if (deps.reports) {
        await archiveDetections(deps.reports, {
          identifier: ref.identifier,
          reference: ref.reference,
          title,
          event_class: result.eventClass.code,
          label: result.eventClass.label,
          threshold: request.inference.threshold,
          precision: request.inference.precision,
          processed_at: now().toISOString(),
          detections: result.detections,
        });
      }
    },
  );

  ctx.counters.inferenced++;
}

function printDetections(out: OutputWriter, result: ClassPassResult): void {
  const { label } = result.eventClass;
  if (result.detections.length === 0) {
    out(`No ${label} detected.`);
    return;
  }
  out(`${label}:`);
  for (const detection of result.detections) {
    out(formatDetection(detection));
  }
}

function printReconciliation(out: OutputWriter, summary: ReconciliationSummary): void {
  out(`Total items: ${summary.total}`);
  out(`Already processed: ${summary.logged}`);
  out(`Audio files on disk: ${summary.cached}`);
  out(`Processed but file missing: ${summary.loggedButMissing}`);
  out(`On disk but not processed: ${summary.cachedButNotLogged}`);
  out(`To process: ${summary.toProcess}`);
}

function printRunSummary(out: OutputWriter, summary: RunSummary): void {
  const c = summary.counters;
  out("");
  out("Run summary");
  out(`Total items: ${c.total}`);
  out(`Inferenced: ${c.inferenced}`);
  out(`Existing files used: ${c.existingFilesUsed}`);
  out(`New downloads: ${c.newDownloads}`);
  out(`Skipped: ${c.skipped}`);
  out(`Failed: ${c.failed}`);
  if (summary.retry_file) {
    out(`Failed items written to ${summary.retry_file}`);
  }
}

async function writeRetryFile(workDir: string, ctx: RunContext): Promise<void> {
  if (ctx.retryList.length === 0) {
    return;
  }
  const retryPath = path.join(workDir, RETRY_FILE);
  const body = ctx.retryList.map((entry) => entry.reference).join("\n") + "\n";
  await fs.writeFile(retryPath, body, "utf-8");
  console.log(
    JSON.stringify({
      scope: "pipeline",
      action: "retry_file_written",
      path: retryPath,
      count: ctx.retryList.length,
    }),
  );
}

async function archiveDetections(
  reports: ReportStore,
  report: DetectionReport,
): Promise<void> {
  try {
    await reports.saveDetections(report);
  } catch (error) {
    console.error(
      JSON.stringify({
        scope: "pipeline",
        action: "report_upload_failed",
        error_type: "report",
        identifier: report.identifier,
        event_class: report.event_class,
        error: errorMessage(error),
      }),
    );
  }
}

async function archiveSummary(
  reports: ReportStore | null | undefined,
  startedAt: string,
  summary: RunSummary,
): Promise<void> {
  if (!reports) {
    return;
  }
  try {
    await reports.saveRunSummary(startedAt, summary);
  } catch (error) {
    console.error(
      JSON.stringify({
        scope: "pipeline",
        action: "summary_upload_failed",
        error_type: "report",
        error: errorMessage(error),
      }),
    );
  }
}
