/**
 * Inference engine: frames the decoded signal and runs one classifier pass
 * per event class over every frame.
 */

import { Classifier } from "./classifier";
import { DecodedAudio } from "./decoder";
import { extractEvents } from "./events";
import {
  ClassPassResult,
  EventClass,
  EventDetection,
  InferenceOptions,
} from "../types/pipeline";

/**
 * Consecutive frames of `batchSize` samples. The trailing partial frame is
 * kept only when it holds at least one second of audio.
 */
export function splitFrames(
  audio: DecodedAudio,
  batchSize: number,
): Float32Array[] {
  const frames: Float32Array[] = [];
  let current = new Float32Array(batchSize);
  let fill = 0;

  for (const chunk of audio.chunks) {
    let pos = 0;
    while (pos < chunk.length) {
      // Aligned full frame inside one chunk: no copy
      if (fill === 0 && chunk.length - pos >= batchSize) {
        frames.push(chunk.subarray(pos, pos + batchSize));
        pos += batchSize;
        continue;
      }

      const take = Math.min(batchSize - fill, chunk.length - pos);
      current.set(chunk.subarray(pos, pos + take), fill);
      fill += take;
      pos += take;

      if (fill === batchSize) {
        frames.push(current);
        current = new Float32Array(batchSize);
        fill = 0;
      }
    }
  }

  if (fill > 0 && fill >= audio.sampleRate) {
    frames.push(current.subarray(0, fill));
  }
  return frames;
}

export async function runClassPass(
  frames: Float32Array[],
  eventClass: EventClass,
  classifier: Classifier,
  options: InferenceOptions,
): Promise<ClassPassResult> {
  const detections: EventDetection[] = [];
  let offset = 0;

  for (const frame of frames) {
    const scores = await classifier.infer(frame);
    detections.push(
      ...extractEvents(scores, {
        classIndex: eventClass.code,
        precision: options.precision,
        offset,
        threshold: options.threshold,
        modelFramesPerSecond: options.modelFramesPerSecond,
      }),
    );
    offset += frame.length / options.sampleRate;
  }

  return { eventClass, frames: frames.length, detections };
}

/**
 * Classes run sequentially; frames are shared between passes
 */
export async function runInference(
  audio: DecodedAudio,
  classes: EventClass[],
  classifier: Classifier,
  options: InferenceOptions,
  onPass?: (result: ClassPassResult) => Promise<void>,
): Promise<ClassPassResult[]> {
  const frames = splitFrames(audio, options.batchSize);
  const results: ClassPassResult[] = [];

  for (const eventClass of classes) {
    const result = await runClassPass(frames, eventClass, classifier, options);
    if (onPass) {
      await onPass(result);
    }
    results.push(result);
  }
  return results;
}
