#!/usr/bin/env node
import "dotenv/config";
import path from "path";
import { parseArgs } from "util";
import { AssetIndex } from "./lib/asset-index";
import { HttpClassifier } from "./lib/classifier";
import { DEFAULT_PRECISION, DEFAULT_THRESHOLD, ScanConfig, loadConfig } from "./lib/config";
import {
  DecisionProvider,
  PolicyDecisionProvider,
  PromptDecisionProvider,
} from "./lib/decisions";
import {
  DecodeError,
  FetchError,
  LedgerWriteError,
  ResolutionError,
  errorMessage,
} from "./lib/errors";
import { resolveEventClasses } from "./lib/event-classes";
import { MODEL_FRAMES_PER_SECOND } from "./lib/events";
import { YtDlpFetcher } from "./lib/fetcher";
import { parsePositiveInt, parseThreshold } from "./lib/guards";
import { Ledger } from "./lib/ledger";
import { RETRY_FILE, ScanRequest, runScan } from "./lib/pipeline";
import { S3ReportStore } from "./lib/reports";
import { StorageClient } from "./lib/storage";
import { BatchPolicy } from "./types/pipeline";

const USAGE = `Usage: soundscan <source...> [options]

Sources: media URLs, local audio files, a .txt list, a playlist,
a channel or an account feed URL.

Options:
  --precision <n>    model frames pooled per reported timestamp (default ${DEFAULT_PRECISION})
  --threshold <n>    minimum confidence in percent (default ${DEFAULT_THRESHOLD})
  --batch-size <n>   samples per classifier frame (default 960000)
  --focus-idx <n>    scan a single event class code
  -F, --farts        scan only farts (60)
  -B, --burps        scan only burps (58)
  --model <path>     model passed to the inference sidecar
  --cookies <path>   cookie file for the downloader
  --work-dir <dir>   download and asset directory
  --ledger <file>    ledger CSV path
  --policy <p>       all | new | missing: answer every prompt from this policy
  --yes              unattended run (same as --policy new)
  -h, --help         show this help`;

const POLICY_FLAGS: Record<string, Exclude<BatchPolicy, "EXIT">> = {
  all: "PROCESS_ALL",
  new: "SKIP_LOGGED_PROCESS_NEW",
  missing: "REDOWNLOAD_LOGGED_MISSING",
};

export interface CliOptions {
  sources: string[];
  request: ScanRequest;
  ledgerPath: string;
  modelPath: string;
  policy: Exclude<BatchPolicy, "EXIT"> | null;
  help: boolean;
}

export function parseCliArgs(argv: string[], config: ScanConfig): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      precision: { type: "string" },
      threshold: { type: "string" },
      "batch-size": { type: "string" },
      "focus-idx": { type: "string" },
      farts: { type: "boolean", short: "F" },
      burps: { type: "boolean", short: "B" },
      model: { type: "string" },
      cookies: { type: "string" },
      "work-dir": { type: "string" },
      ledger: { type: "string" },
      policy: { type: "string" },
      yes: { type: "boolean", short: "y" },
      help: { type: "boolean", short: "h" },
    },
  });

  let focusIdx: number | undefined;
  if (values["focus-idx"] !== undefined) {
    const code = Number(values["focus-idx"]);
    if (!Number.isInteger(code) || code < 0) {
      throw new Error(`Expected class code for --focus-idx, got "${values["focus-idx"]}"`);
    }
    focusIdx = code;
  } else if (values.farts) {
    focusIdx = 60;
  } else if (values.burps) {
    focusIdx = 58;
  }

  let policy: Exclude<BatchPolicy, "EXIT"> | null = null;
  if (values.policy !== undefined) {
    const mapped = POLICY_FLAGS[values.policy];
    if (!mapped) {
      throw new Error(`Unknown --policy "${values.policy}" (expected all, new or missing)`);
    }
    policy = mapped;
  } else if (values.yes) {
    policy = "SKIP_LOGGED_PROCESS_NEW";
  }

  const workDir = values["work-dir"] ? path.resolve(values["work-dir"]) : config.workDir;
  const ledgerPath = values.ledger
    ? path.resolve(values.ledger)
    : values["work-dir"]
      ? path.join(workDir, path.basename(config.ledgerPath))
      : config.ledgerPath;

  return {
    sources: positionals,
    ledgerPath,
    modelPath: values.model || config.modelPath,
    policy,
    help: values.help ?? false,
    request: {
      sources: positionals,
      eventClasses: resolveEventClasses(focusIdx),
      workDir,
      cookies: values.cookies,
      ffmpegPath: config.ffmpegPath,
      inference: {
        sampleRate: config.sampleRate,
        batchSize: parsePositiveInt(values["batch-size"], "--batch-size", config.batchSize),
        precision: parsePositiveInt(values.precision, "--precision", DEFAULT_PRECISION),
        threshold: parseThreshold(values.threshold, DEFAULT_THRESHOLD),
        modelFramesPerSecond: MODEL_FRAMES_PER_SECOND,
      },
    },
  };
}

export async function main(argv: string[]): Promise<number> {
  const config = loadConfig();

  let options: CliOptions;
  try {
    options = parseCliArgs(argv, config);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    console.log(USAGE);
    return 1;
  }

  if (options.help || options.sources.length === 0) {
    console.log(USAGE);
    return options.help ? 0 : 1;
  }

  const decisions: DecisionProvider = options.policy
    ? new PolicyDecisionProvider({ policy: options.policy })
    : new PromptDecisionProvider();

  const reports = config.reportBucket
    ? new S3ReportStore(new StorageClient(config.reportBucket, config.awsRegion))
    : null;

  const deps = {
    fetcher: new YtDlpFetcher({ workDir: options.request.workDir, binary: config.ytdlpPath }),
    classifier: new HttpClassifier({
      endpoint: config.classifierEndpoint,
      model: options.modelPath,
      timeoutMs: config.classifierTimeoutMs,
    }),
    decisions,
    ledger: new Ledger(options.ledgerPath),
    assets: new AssetIndex(options.request.workDir),
    reports,
  };

  let request = options.request;
  try {
    for (;;) {
      const summary = await runScan(request, deps);
      if (summary.retry.length === 0 || !summary.retry_file) {
        return 0;
      }
      if (!(await decisions.confirmRetry(summary.retry))) {
        return 0;
      }
      request = { ...request, sources: [path.join(request.workDir, RETRY_FILE)] };
    }
  } catch (error) {
    console.error(
      JSON.stringify({
        scope: "cli",
        status: "error",
        error_type: errorType(error),
        error: errorMessage(error),
      }),
    );
    return 1;
  } finally {
    decisions.close?.();
  }
}

function errorType(error: unknown): string {
  if (error instanceof ResolutionError) return "resolution";
  if (error instanceof FetchError) return "fetch";
  if (error instanceof DecodeError) return "decode";
  if (error instanceof LedgerWriteError) return "ledger_write";
  return "unknown";
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error("Unexpected error:", error);
      process.exitCode = 1;
    });
}
