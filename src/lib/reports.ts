/**
 * Detection report archive
 *
 * Reports are an optional copy of what the run printed; the ledger stays
 * the record of completed work, so an archive failure never stops a run.
 */

import { keys } from "./keys";
import { StorageClient } from "./storage";
import { EventDetection, RunSummary } from "../types/pipeline";

export interface DetectionReport {
  identifier: string;
  reference: string;
  title: string;
  event_class: number;
  label: string;
  threshold: number;
  precision: number;
  processed_at: string;
  detections: EventDetection[];
}

export interface ReportStore {
  saveDetections(report: DetectionReport): Promise<string>;
  saveRunSummary(startedAt: string, summary: RunSummary): Promise<string>;
}

export class S3ReportStore implements ReportStore {
  constructor(private storage: StorageClient) {}

  async saveDetections(report: DetectionReport): Promise<string> {
    const key = keys.detections(report.identifier, report.event_class);
    await this.storage.saveJson(key, report);
    return key;
  }

  async saveRunSummary(startedAt: string, summary: RunSummary): Promise<string> {
    const key = keys.runSummary(startedAt);
    await this.storage.saveJson(key, summary);
    return key;
  }
}
