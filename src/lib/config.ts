/**
 * Runtime configuration from the environment. Entry points load .env through
 * dotenv before calling loadConfig(); CLI flags and event payloads override.
 */

import path from "path";
import { parsePositiveInt } from "./guards";
import { DEFAULT_CHUNK_SAMPLES, DEFAULT_SAMPLE_RATE } from "./decoder";

export interface ScanConfig {
  workDir: string;
  ledgerPath: string;
  sampleRate: number;
  batchSize: number;
  ffmpegPath: string;
  ytdlpPath: string;
  classifierEndpoint: string;
  classifierTimeoutMs: number;
  modelPath: string;
  reportBucket: string | null;
  awsRegion: string;
  port: number;
}

export const DEFAULT_PRECISION = 100;
export const DEFAULT_THRESHOLD = 20;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScanConfig {
  const workDir = path.resolve(env.SOUNDSCAN_WORK_DIR || ".");
  const ledger = env.SOUNDSCAN_LEDGER || "inference_log.csv";

  return {
    workDir,
    ledgerPath: path.resolve(workDir, ledger),
    sampleRate: parsePositiveInt(env.SAMPLE_RATE, "SAMPLE_RATE", DEFAULT_SAMPLE_RATE),
    batchSize: parsePositiveInt(env.BATCH_SIZE, "BATCH_SIZE", DEFAULT_CHUNK_SAMPLES),
    ffmpegPath: env.FFMPEG_PATH || "ffmpeg",
    ytdlpPath: env.YTDLP_PATH || "yt-dlp",
    classifierEndpoint: env.CLASSIFIER_ENDPOINT || "http://localhost:7002",
    classifierTimeoutMs: parsePositiveInt(
      env.CLASSIFIER_TIMEOUT_MS,
      "CLASSIFIER_TIMEOUT_MS",
      120000,
    ),
    modelPath: env.MODEL_PATH || "bdetectionmodel_05_01_23.onnx",
    reportBucket: env.REPORT_BUCKET_NAME || null,
    awsRegion: env.AWS_REGION || "us-east-1",
    port: parsePositiveInt(env.PORT, "PORT", 3000),
  };
}
