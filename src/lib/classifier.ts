/**
 * Classifier client
 *
 * The pretrained sound-event model runs in an inference sidecar. Each call
 * sends one mono frame shaped [1, N] and gets back the framewise score
 * matrix (model frames x classes) for that frame.
 */

import axios, { AxiosInstance } from "axios";
import { ensureArray, ensureRecord } from "./guards";
import { FramewiseScores } from "./events";

export interface Classifier {
  infer(frame: Float32Array): Promise<FramewiseScores>;
}

export interface InferRequest {
  model: string;
  shape: [number, number];
  dtype: "float32";
  // Little-endian float32 samples, base64
  data: string;
}

export interface HttpClassifierOptions {
  endpoint?: string;
  model?: string;
  timeoutMs?: number;
}

export class HttpClassifier implements Classifier {
  private client: AxiosInstance;
  private model: string;

  constructor(options: HttpClassifierOptions = {}) {
    const endpoint =
      options.endpoint ||
      process.env.CLASSIFIER_ENDPOINT ||
      "http://localhost:7002";
    this.model =
      options.model || process.env.MODEL_PATH || "bdetectionmodel_05_01_23.onnx";

    this.client = axios.create({
      baseURL: endpoint,
      timeout: options.timeoutMs ?? 120000,
      headers: { "Content-Type": "application/json" },
    });
  }

  async infer(frame: Float32Array): Promise<FramewiseScores> {
    const body: InferRequest = {
      model: this.model,
      shape: [1, frame.length],
      dtype: "float32",
      data: encodeFrame(frame),
    };

    try {
      const response = await this.client.post<unknown>("/infer", body);
      return parseFramewise(response.data);
    } catch (error) {
      console.error(
        JSON.stringify({
          scope: "classifier_client",
          action: "infer_error",
          model: this.model,
          frame_length: frame.length,
          status: axios.isAxiosError(error) ? error.response?.status : undefined,
          error: error instanceof Error ? error.message : String(error),
        }),
      );
      throw error;
    }
  }
}

export function encodeFrame(frame: Float32Array): string {
  const bytes = Buffer.alloc(frame.length * 4);
  for (let i = 0; i < frame.length; i++) {
    bytes.writeFloatLE(frame[i], i * 4);
  }
  return bytes.toString("base64");
}

/**
 * Accepts { framewise: number[][] } or { framewise: number[1][][] }
 * (the batch axis of a [1, frames, classes] output)
 */
export function parseFramewise(payload: unknown): number[][] {
  const body = ensureRecord(payload, "classifier response");
  let rows = ensureArray(body.framewise, "framewise");

  const first = rows[0];
  if (rows.length === 1 && Array.isArray(first) && Array.isArray(first[0])) {
    rows = first;
  }

  return rows.map((row, i) =>
    ensureArray(row, `framewise[${i}]`).map((value, j) => {
      if (typeof value !== "number" || Number.isNaN(value)) {
        throw new Error(`Expected number at framewise[${i}][${j}]`);
      }
      return value;
    }),
  );
}
