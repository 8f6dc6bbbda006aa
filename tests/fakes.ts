/**
 * In-process stand-ins for the downloader, the classifier sidecar, the codec
 * and the terminal prompts
 */

import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { jest } from "@jest/globals";
import { Classifier } from "../src/lib/classifier";
import {
  ConflictItem,
  DecisionProvider,
  ReinferChoice,
  ReuseChoice,
} from "../src/lib/decisions";
import { AudioDecoder, DecodedAudio } from "../src/lib/decoder";
import { DecodeError, FetchError } from "../src/lib/errors";
import { FramewiseScores } from "../src/lib/events";
import { Fetcher, MediaMetadata } from "../src/lib/fetcher";
import { extractIdentifier } from "../src/lib/identifiers";
import { BatchPolicy, ReconciliationSummary } from "../src/types/pipeline";

export function silenceLogs(): void {
  jest.spyOn(console, "log").mockImplementation(() => {});
  jest.spyOn(console, "error").mockImplementation(() => {});
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "soundscan-test-"));
}

export class FakeFetcher implements Fetcher {
  metadataCalls: string[] = [];
  downloads: string[] = [];
  listCalls: string[] = [];
  failing = new Set<string>();
  entries = new Map<string, string[]>();
  // Downloader ids for references whose identifier is the URL itself
  mediaIds = new Map<string, string>();

  constructor(private workDir: string) {}

  title(identifier: string): string {
    return `Clip ${identifier}`;
  }

  async resolveMetadata(reference: string): Promise<MediaMetadata> {
    this.metadataCalls.push(reference);
    const identifier = this.mediaIds.get(reference) ?? extractIdentifier(reference);
    return { identifier, title: this.title(identifier) };
  }

  async download(reference: string): Promise<string> {
    this.downloads.push(reference);
    if (this.failing.has(reference)) {
      throw new FetchError("HTTP Error 403: Forbidden", reference);
    }
    const identifier = this.mediaIds.get(reference) ?? extractIdentifier(reference);
    const file = path.join(this.workDir, `${this.title(identifier)} [${identifier}].m4a`);
    await fs.writeFile(file, "fake audio");
    return file;
  }

  async listEntries(reference: string): Promise<string[]> {
    this.listCalls.push(reference);
    const urls = this.entries.get(reference);
    if (!urls) {
      throw new FetchError(`Unable to list ${reference}`, reference);
    }
    return urls;
  }
}

/**
 * One row per model frame; `hits` maps class code to score, all other
 * columns are zero
 */
export function scoreRows(
  hits: Array<Record<number, number>>,
  classes = 61,
): number[][] {
  return hits.map((row) => {
    const values = new Array<number>(classes).fill(0);
    for (const [code, score] of Object.entries(row)) {
      values[Number(code)] = score;
    }
    return values;
  });
}

export class FakeClassifier implements Classifier {
  frames: number[] = [];

  constructor(private scores: FramewiseScores) {}

  async infer(frame: Float32Array): Promise<FramewiseScores> {
    this.frames.push(frame.length);
    return this.scores;
  }
}

export function silentAudio(samples: number, sampleRate = 32000): DecodedAudio {
  return { chunks: [new Float32Array(samples)], sampleCount: samples, sampleRate };
}

/**
 * Decoder that "decodes" every asset to `samples` samples of silence, and
 * fails for asset paths containing any of `broken`
 */
export function fakeDecoder(samples: number, broken: string[] = []) {
  const decoded: string[] = [];
  const decode: AudioDecoder = async (assetPath, options) => {
    decoded.push(assetPath);
    if (broken.some((part) => assetPath.includes(part))) {
      throw new DecodeError(`No audio could be extracted from ${assetPath}`, assetPath);
    }
    return silentAudio(samples, options?.sampleRate);
  };
  return { decode, decoded };
}

export interface ScriptedAnswers {
  reinferAll?: boolean;
  policy?: BatchPolicy;
  reuse?: ReuseChoice[];
  reinfer?: ReinferChoice[];
  redownload?: boolean;
  retry?: boolean;
}

/**
 * Answers prompts from a script and records which prompts were asked
 */
export class ScriptedDecisions implements DecisionProvider {
  asked: string[] = [];

  constructor(private answers: ScriptedAnswers = {}) {}

  async confirmReinferAll(_summary: ReconciliationSummary): Promise<boolean> {
    this.asked.push("reinfer_all");
    return this.answers.reinferAll ?? false;
  }

  async chooseBatchPolicy(_summary: ReconciliationSummary): Promise<BatchPolicy> {
    this.asked.push("policy");
    return this.answers.policy ?? "EXIT";
  }

  async confirmReuse(item: ConflictItem): Promise<ReuseChoice> {
    this.asked.push(`reuse:${item.identifier}`);
    return this.answers.reuse?.shift() ?? "use";
  }

  async confirmReinfer(item: ConflictItem): Promise<ReinferChoice> {
    this.asked.push(`reinfer:${item.identifier}`);
    return this.answers.reinfer?.shift() ?? "run";
  }

  async confirmRedownload(item: ConflictItem): Promise<boolean> {
    this.asked.push(`redownload:${item.identifier}`);
    return this.answers.redownload ?? true;
  }

  async confirmRetry(): Promise<boolean> {
    this.asked.push("retry");
    return this.answers.retry ?? false;
  }
}
