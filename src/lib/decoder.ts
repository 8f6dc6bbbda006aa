/**
 * Streaming audio decoder
 *
 * ffmpeg converts the asset to raw s16le mono PCM at the target rate on
 * stdout; the stream is read in bounded chunks and each chunk is converted
 * to float samples in [-1, 1).
 */

import { spawn } from "child_process";
import { DecodeError } from "./errors";

export const DEFAULT_SAMPLE_RATE = 32000;
export const DEFAULT_CHUNK_SAMPLES = 960000;

export interface DecodedAudio {
  chunks: Float32Array[];
  sampleCount: number;
  sampleRate: number;
}

export interface DecodeOptions {
  sampleRate?: number;
  chunkSamples?: number;
  ffmpegPath?: string;
}

export type AudioDecoder = (
  assetPath: string,
  options?: DecodeOptions,
) => Promise<DecodedAudio>;

export function pcm16ToFloat32(bytes: Buffer): Float32Array {
  const samples = new Float32Array(bytes.length >> 1);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = bytes.readInt16LE(i * 2) / 32768;
  }
  return samples;
}

/**
 * Re-chunk a PCM byte stream into float chunks of chunkSamples samples.
 * Only the final chunk may be shorter; a dangling odd byte is dropped.
 */
export async function* readPcmChunks(
  stream: AsyncIterable<Buffer | Uint8Array>,
  chunkSamples: number,
): AsyncGenerator<Float32Array> {
  const chunkBytes = chunkSamples * 2;
  let pending: Buffer[] = [];
  let pendingBytes = 0;

  for await (const data of stream) {
    const buf = Buffer.isBuffer(data) ? data : Buffer.from(data);
    pending.push(buf);
    pendingBytes += buf.length;

    if (pendingBytes < chunkBytes) {
      continue;
    }

    let joined = Buffer.concat(pending, pendingBytes);
    while (joined.length >= chunkBytes) {
      yield pcm16ToFloat32(joined.subarray(0, chunkBytes));
      joined = joined.subarray(chunkBytes);
    }
    pending = joined.length ? [joined] : [];
    pendingBytes = joined.length;
  }

  const usable = pendingBytes - (pendingBytes % 2);
  if (usable > 0) {
    yield pcm16ToFloat32(Buffer.concat(pending, pendingBytes).subarray(0, usable));
  }
}

export async function decodeAudio(
  assetPath: string,
  options: DecodeOptions = {},
): Promise<DecodedAudio> {
  const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
  const chunkSamples = options.chunkSamples ?? DEFAULT_CHUNK_SAMPLES;
  const ffmpegPath = options.ffmpegPath || process.env.FFMPEG_PATH || "ffmpeg";

  const args = [
    "-i",
    assetPath,
    "-f",
    "s16le",
    "-ac",
    "1",
    "-acodec",
    "pcm_s16le",
    "-ar",
    String(sampleRate),
    "-",
  ];

  console.log(
    JSON.stringify({
      scope: "decoder",
      action: "decode_start",
      asset: assetPath,
      sample_rate: sampleRate,
      chunk_samples: chunkSamples,
    }),
  );

  const child = spawn(ffmpegPath, args, { stdio: ["ignore", "pipe", "ignore"] });
  const failure: { spawnError: Error | null } = { spawnError: null };
  child.on("error", (error) => {
    failure.spawnError = error;
  });
  const closed = new Promise<number | null>((resolve) => {
    child.on("close", (code) => resolve(code));
  });

  const chunks: Float32Array[] = [];
  let sampleCount = 0;

  try {
    for await (const chunk of readPcmChunks(child.stdout, chunkSamples)) {
      chunks.push(chunk);
      sampleCount += chunk.length;
    }
    const exitCode = failure.spawnError ? null : await closed;

    if (sampleCount === 0) {
      const reason = failure.spawnError
        ? `failed to start ${ffmpegPath}: ${failure.spawnError.message}`
        : `codec exited with code ${exitCode}`;
      throw new DecodeError(
        `No audio could be extracted from ${assetPath} (${reason})`,
        assetPath,
      );
    }
  } finally {
    if (child.exitCode === null && !child.killed) {
      child.kill("SIGKILL");
    }
  }

  console.log(
    JSON.stringify({
      scope: "decoder",
      action: "decode_success",
      asset: assetPath,
      samples: sampleCount,
      seconds: sampleCount / sampleRate,
    }),
  );

  return { chunks, sampleCount, sampleRate };
}
