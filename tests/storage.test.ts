import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import {
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { checkDetections } from "../src/lib/check-utils";
import { keys } from "../src/lib/keys";
import { S3ReportStore } from "../src/lib/reports";
import { StorageClient } from "../src/lib/storage";

/**
 * In-memory bucket answering the commands StorageClient sends
 */
class FakeBucket {
  objects = new Map<string, string>();

  send = async (command: unknown): Promise<unknown> => {
    if (command instanceof PutObjectCommand) {
      this.objects.set(String(command.input.Key), String(command.input.Body));
      return {};
    }
    if (command instanceof GetObjectCommand || command instanceof HeadObjectCommand) {
      const body = this.objects.get(String(command.input.Key));
      if (body === undefined) {
        const error = new Error("Not Found");
        error.name = command instanceof HeadObjectCommand ? "NotFound" : "NoSuchKey";
        throw error;
      }
      return { Body: { transformToString: async () => body } };
    }
    throw new Error("unexpected command");
  };
}

describe("report storage", () => {
  let bucket: FakeBucket;
  let storage: StorageClient;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
    bucket = new FakeBucket();
    const s3 = new S3Client({ region: "us-east-1" });
    jest.spyOn(s3, "send").mockImplementation(bucket.send as never);
    storage = new StorageClient("test-bucket", "us-east-1", s3);
  });

  it("builds keys that keep URL identifiers in one path segment", () => {
    expect(keys.detections("aaaaaaaaaaa", 60)).toBe("detections/aaaaaaaaaaa/60.json");
    expect(keys.detections("https://example.com/a.mp3", 58)).toBe(
      "detections/https%3A%2F%2Fexample.com%2Fa.mp3/58.json",
    );
  });

  it("saves detection reports under their key", async () => {
    const reports = new S3ReportStore(storage);

    const key = await reports.saveDetections({
      identifier: "aaaaaaaaaaa",
      reference: "https://www.youtube.com/watch?v=aaaaaaaaaaa",
      title: "Clip",
      event_class: 60,
      label: "farts",
      threshold: 20,
      precision: 100,
      processed_at: "2026-03-01T12:00:00.000Z",
      detections: [{ timestampSeconds: 3, confidencePercent: 71 }],
    });

    expect(key).toBe("detections/aaaaaaaaaaa/60.json");
    expect(await storage.exists(key)).toBe(true);
    expect(await storage.loadJson(key)).toMatchObject({ title: "Clip", detections: [{ confidencePercent: 71 }] });
  });

  it("reports missing objects as absent", async () => {
    expect(await storage.exists("detections/none/60.json")).toBe(false);
    await expect(storage.loadJson("detections/none/60.json")).rejects.toThrow("Not Found");
  });

  it("counts archived reports for an identifier", async () => {
    await storage.saveJson(keys.detections("aaaaaaaaaaa", 58), { title: "Clip", detections: [] });
    expect(await checkDetections(storage, "aaaaaaaaaaa")).toBe(1);
  });

  it("requires a bucket name", () => {
    expect(() => new StorageClient("", "us-east-1")).toThrow("REPORT_BUCKET_NAME is required");
  });
});
