import { describe, it, expect } from "@jest/globals";
import {
  extractEvents,
  formatDetection,
  maxPool,
  secondsToHms,
  selectColumn,
} from "../src/lib/events";

const column = (values: number[]) => values.map((v) => [v]);

describe("event extraction", () => {
  it("pools, filters and timestamps a confidence column", () => {
    const detections = extractEvents(column([0.05, 0.95, 0.1, 0.8, 0]), {
      classIndex: 0,
      precision: 2,
      offset: 0,
      threshold: 50,
    });

    expect(detections).toEqual([
      { timestampSeconds: 0, confidencePercent: 95 },
      { timestampSeconds: 0.02, confidencePercent: 80 },
    ]);
  });

  it("produces ceil(L / P) windows, pooling the short tail on its own", () => {
    expect(maxPool([1, 5, 2, 9, 0, 3, 4], 3)).toEqual([5, 9, 4]);
    for (const [length, precision] of [
      [10, 3],
      [9, 3],
      [1, 100],
      [250, 100],
    ]) {
      const values = Array.from({ length }, (_, i) => i / length);
      expect(maxPool(values, precision)).toHaveLength(Math.ceil(length / precision));
    }
  });

  it("rejects a non-positive precision", () => {
    expect(() => maxPool([1], 0)).toThrow("Precision must be a positive integer, got 0");
  });

  it("never gains detections when the threshold goes up", () => {
    const scores = column([0.1, 0.35, 0.6, 0.2, 0.9, 0.45, 0.7, 0.05]);
    const at = (threshold: number) =>
      extractEvents(scores, { classIndex: 0, precision: 1, offset: 0, threshold }).map(
        (d) => d.timestampSeconds,
      );

    let previous = at(0);
    for (const threshold of [10, 25, 50, 75, 100]) {
      const current = at(threshold);
      expect(previous).toEqual(expect.arrayContaining(current));
      previous = current;
    }
    expect(at(0)).toHaveLength(8);
    expect(at(100)).toEqual([]);
  });

  it("shifts timestamps by the frame offset", () => {
    const detections = extractEvents(column([0.9, 0, 0.9]), {
      classIndex: 0,
      precision: 1,
      offset: 30,
      threshold: 50,
      modelFramesPerSecond: 2,
    });
    expect(detections.map((d) => d.timestampSeconds)).toEqual([30, 31]);
  });

  it("keeps a window whose score equals the threshold", () => {
    const detections = extractEvents([[0.29], [0.57]], {
      classIndex: 0,
      precision: 1,
      offset: 0,
      threshold: 29,
    });
    expect(detections).toEqual([
      { timestampSeconds: 0, confidencePercent: 28 },
      { timestampSeconds: 0.01, confidencePercent: 56 },
    ]);
  });

  it("truncates the reported confidence", () => {
    const [detection] = extractEvents([[0.957]], { classIndex: 0, precision: 1, offset: 0, threshold: 20 });
    expect(detection.confidencePercent).toBe(95);
  });

  it("reads the requested class column", () => {
    expect(selectColumn([[0, 1, 2], [3, 4, 5]], 2)).toEqual([2, 5]);
    expect(() => selectColumn([[0, 1]], 60)).toThrow("Class index 60 out of range for frame 0 (2 classes)");
  });

  it("formats detections as HH:MM:SS NN%", () => {
    expect(secondsToHms(0)).toBe("00:00:00");
    expect(secondsToHms(3725.9)).toBe("01:02:05");
    expect(formatDetection({ timestampSeconds: 61.5, confidencePercent: 87 })).toBe("00:01:01 87%");
  });
});
