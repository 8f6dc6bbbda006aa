/**
 * Local audio asset index
 *
 * An asset belongs to an identifier when its file name contains the
 * identifier and ends with a recognized audio extension. Extensions are
 * tried in priority order; the first match wins.
 */

import { promises as fs } from "fs";
import path from "path";
import { AssetRecord } from "../types/pipeline";

export const AUDIO_EXTENSIONS = [".opus", ".m4a", ".mp3", ".mp4"] as const;

export class AssetSnapshot {
  private records = new Map<string, AssetRecord>();

  constructor(records: AssetRecord[] = []) {
    for (const record of records) {
      this.records.set(record.identifier, record);
    }
  }

  get(identifier: string): AssetRecord | null {
    return this.records.get(identifier) ?? null;
  }

  has(identifier: string): boolean {
    return this.records.has(identifier);
  }

  set(record: AssetRecord): void {
    this.records.set(record.identifier, record);
  }

  delete(identifier: string): void {
    this.records.delete(identifier);
  }
}

export class AssetIndex {
  constructor(readonly workDir: string) {}

  async listFiles(): Promise<string[]> {
    const dirents = await fs.readdir(this.workDir, { withFileTypes: true });
    return dirents
      .filter((d) => d.isFile())
      .map((d) => d.name)
      .sort();
  }

  /**
   * Find the authoritative asset for each identifier in one directory scan
   */
  async scan(identifiers: string[]): Promise<AssetSnapshot> {
    const files = await this.listFiles();
    const records: AssetRecord[] = [];

    for (const identifier of identifiers) {
      const match = matchAsset(identifier, files);
      if (match) {
        records.push({
          identifier,
          localPath: path.join(this.workDir, match),
        });
      }
    }

    console.log(
      JSON.stringify({
        scope: "asset_index",
        action: "scan_complete",
        work_dir: this.workDir,
        files: files.length,
        identifiers: identifiers.length,
        matched: records.length,
      }),
    );

    return new AssetSnapshot(records);
  }

  async find(identifier: string): Promise<AssetRecord | null> {
    const match = matchAsset(identifier, await this.listFiles());
    return match
      ? { identifier, localPath: path.join(this.workDir, match) }
      : null;
  }

  async remove(record: AssetRecord): Promise<void> {
    await fs.rm(record.localPath, { force: true });
    console.log(
      JSON.stringify({
        scope: "asset_index",
        action: "asset_removed",
        identifier: record.identifier,
        file: path.basename(record.localPath),
      }),
    );
  }
}

export function matchAsset(identifier: string, files: string[]): string | null {
  if (!identifier) {
    return null;
  }
  for (const ext of AUDIO_EXTENSIONS) {
    const hit = files.find(
      (file) => file.includes(identifier) && file.toLowerCase().endsWith(ext),
    );
    if (hit) {
      return hit;
    }
  }
  return null;
}

/**
 * Title from a "Title [id].ext" download stamp, or the bare file name
 */
export function titleFromAssetPath(assetPath: string): string {
  const base = path.basename(assetPath, path.extname(assetPath));
  const match = base.match(/^(.*) \[[^\]]+\]$/);
  return match && match[1] ? match[1] : base;
}
