import { describe, it, expect } from "@jest/globals";
import { runClassPass, runInference, splitFrames } from "../src/lib/inference";
import { ClassPassResult, InferenceOptions } from "../src/types/pipeline";
import { FakeClassifier, scoreRows } from "./fakes";

const seq = (from: number, count: number) =>
  Float32Array.from({ length: count }, (_, i) => from + i);

const options = (overrides: Partial<InferenceOptions> = {}): InferenceOptions => ({
  sampleRate: 2,
  batchSize: 4,
  precision: 1,
  threshold: 50,
  modelFramesPerSecond: 100,
  ...overrides,
});

describe("inference engine", () => {
  describe("splitFrames", () => {
    it("builds frames across chunk boundaries", () => {
      const frames = splitFrames(
        { chunks: [seq(0, 5), seq(5, 7)], sampleCount: 12, sampleRate: 2 },
        4,
      );
      expect(frames.map((f) => Array.from(f))).toEqual([
        [0, 1, 2, 3],
        [4, 5, 6, 7],
        [8, 9, 10, 11],
      ]);
    });

    it("keeps a trailing partial frame only if it holds a second of audio", () => {
      const audio = { chunks: [seq(0, 11)], sampleCount: 11, sampleRate: 2 };
      expect(splitFrames(audio, 4).map((f) => f.length)).toEqual([4, 4, 3]);

      const slower = { ...audio, sampleRate: 4 };
      expect(splitFrames(slower, 4).map((f) => f.length)).toEqual([4, 4]);
    });
  });

  describe("runClassPass", () => {
    it("offsets each frame by the audio already covered", async () => {
      const classifier = new FakeClassifier(scoreRows([{ 60: 0.9 }]));
      const frames = [seq(0, 4), seq(0, 4), seq(0, 3)];

      const result = await runClassPass(frames, { code: 60, label: "farts" }, classifier, options());

      expect(classifier.frames).toEqual([4, 4, 3]);
      expect(result.frames).toBe(3);
      expect(result.detections).toEqual([
        { timestampSeconds: 0, confidencePercent: 90 },
        { timestampSeconds: 2, confidencePercent: 90 },
        { timestampSeconds: 4, confidencePercent: 90 },
      ]);
    });
  });

  describe("runInference", () => {
    it("runs one pass per class in order and reports each pass", async () => {
      const classifier = new FakeClassifier(scoreRows([{ 60: 0.9, 58: 0.1 }]));
      const passes: number[] = [];

      const results = await runInference(
        { chunks: [seq(0, 8)], sampleCount: 8, sampleRate: 2 },
        [
          { code: 60, label: "farts" },
          { code: 58, label: "burps" },
        ],
        classifier,
        options(),
        async (result: ClassPassResult) => {
          passes.push(result.eventClass.code);
        },
      );

      expect(passes).toEqual([60, 58]);
      expect(results.map((r) => r.detections.length)).toEqual([2, 0]);
      expect(classifier.frames).toEqual([4, 4, 4, 4]);
    });
  });
});
