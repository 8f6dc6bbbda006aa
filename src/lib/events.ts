/**
 * Event extraction from framewise classifier scores
 */

import { EventDetection } from "../types/pipeline";

export const MODEL_FRAMES_PER_SECOND = 100;

/**
 * Rows are model frames, columns are event classes
 */
export type FramewiseScores = ArrayLike<ArrayLike<number>>;

export function selectColumn(
  scores: FramewiseScores,
  classIndex: number,
): number[] {
  const column: number[] = [];
  for (let i = 0; i < scores.length; i++) {
    const value = scores[i][classIndex];
    if (value === undefined) {
      throw new Error(
        `Class index ${classIndex} out of range for frame ${i} (${scores[i].length} classes)`,
      );
    }
    column.push(value);
  }
  return column;
}

/**
 * Max-pool into non-overlapping windows of `precision` values.
 * The shorter trailing window is pooled on its own.
 */
export function maxPool(values: ArrayLike<number>, precision: number): number[] {
  if (!Number.isInteger(precision) || precision <= 0) {
    throw new Error(`Precision must be a positive integer, got ${precision}`);
  }
  const pooled: number[] = [];
  for (let start = 0; start < values.length; start += precision) {
    const end = Math.min(start + precision, values.length);
    let max = values[start];
    for (let i = start + 1; i < end; i++) {
      if (values[i] > max) max = values[i];
    }
    pooled.push(max);
  }
  return pooled;
}

export interface ExtractOptions {
  classIndex: number;
  precision: number;
  // Seconds already covered by earlier frames
  offset: number;
  // Percent, 0-100
  threshold: number;
  modelFramesPerSecond?: number;
}

export function extractEvents(
  scores: FramewiseScores,
  options: ExtractOptions,
): EventDetection[] {
  const fps = options.modelFramesPerSecond ?? MODEL_FRAMES_PER_SECOND;
  const pooled = maxPool(selectColumn(scores, options.classIndex), options.precision);

  const detections: EventDetection[] = [];
  pooled.forEach((score, windowIndex) => {
    if (score < options.threshold / 100) {
      return;
    }
    detections.push({
      timestampSeconds:
        options.offset + (windowIndex * options.precision) / fps,
      confidencePercent: Math.floor(score * 100),
    });
  });
  return detections;
}

export function secondsToHms(seconds: number): string {
  const total = Math.floor(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return [hours, minutes, secs].map((n) => String(n).padStart(2, "0")).join(":");
}

export function formatDetection(detection: EventDetection): string {
  return `${secondsToHms(detection.timestampSeconds)} ${detection.confidencePercent}%`;
}
