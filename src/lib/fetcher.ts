/**
 * Media fetcher: metadata resolution, feed listing and audio download
 *
 * The pipeline only depends on the Fetcher interface; YtDlpFetcher is the
 * production adapter that shells out to yt-dlp.
 */

import { spawn } from "child_process";
import { promises as fs } from "fs";
import path from "path";
import { FetchError, errorMessage } from "./errors";
import { ensureArray, ensureRecord, isNonEmptyString, isRecord } from "./guards";

export interface MediaMetadata {
  identifier: string;
  title: string;
}

export interface Fetcher {
  resolveMetadata(reference: string, cookies?: string): Promise<MediaMetadata>;
  /**
   * Download the audio for a reference into the working directory.
   * The file name must contain the identifier so a later asset scan finds it.
   */
  download(reference: string, cookies?: string): Promise<string>;
  listEntries(reference: string, cookies?: string): Promise<string[]>;
}

// Filename stamp the asset index relies on
export const OUTPUT_TEMPLATE = "%(title)s [%(id)s].%(ext)s";

export interface YtDlpFetcherOptions {
  workDir: string;
  binary?: string;
}

export class YtDlpFetcher implements Fetcher {
  private binary: string;
  private workDir: string;

  constructor(options: YtDlpFetcherOptions) {
    this.workDir = options.workDir;
    this.binary = options.binary || process.env.YTDLP_PATH || "yt-dlp";
  }

  async resolveMetadata(
    reference: string,
    cookies?: string,
  ): Promise<MediaMetadata> {
    const stdout = await this.run(
      "resolve_metadata",
      reference,
      ["-J", "--no-playlist", "--skip-download", "--no-warnings"],
      cookies,
    );

    try {
      const info = ensureRecord(JSON.parse(stdout), "yt-dlp metadata");
      const identifier = isNonEmptyString(info.id) ? info.id : null;
      if (!identifier) {
        throw new Error("metadata has no id");
      }
      return {
        identifier,
        title: isNonEmptyString(info.title) ? info.title : reference,
      };
    } catch (error) {
      throw new FetchError(
        `Invalid metadata for ${reference}: ${errorMessage(error)}`,
        reference,
        error,
      );
    }
  }

  async listEntries(reference: string, cookies?: string): Promise<string[]> {
    const stdout = await this.run(
      "list_entries",
      reference,
      ["-J", "--flat-playlist", "--no-warnings"],
      cookies,
    );

    let entries: unknown[];
    try {
      const info = ensureRecord(JSON.parse(stdout), "yt-dlp playlist");
      entries = info.entries == null ? [] : ensureArray(info.entries, "entries");
    } catch (error) {
      throw new FetchError(
        `Invalid playlist listing for ${reference}: ${errorMessage(error)}`,
        reference,
        error,
      );
    }

    const urls: string[] = [];
    for (const entry of entries) {
      if (!isRecord(entry)) continue;
      if (isNonEmptyString(entry.url) && entry.url.startsWith("http")) {
        urls.push(entry.url);
      } else if (isNonEmptyString(entry.id)) {
        urls.push(`https://www.youtube.com/watch?v=${entry.id}`);
      }
    }
    return urls;
  }

  async download(reference: string, cookies?: string): Promise<string> {
    const stdout = await this.run(
      "download",
      reference,
      [
        "-f",
        "bestaudio[ext=m4a]/bestaudio",
        "-o",
        OUTPUT_TEMPLATE,
        "-P",
        this.workDir,
        "--no-playlist",
        "--no-warnings",
        "-N",
        "4",
        "--print",
        "after_move:filepath",
        "--no-simulate",
      ],
      cookies,
    );

    const lines = stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean);
    const filePath = lines[lines.length - 1];

    if (!filePath) {
      throw new FetchError(
        `yt-dlp reported no output file for ${reference}`,
        reference,
      );
    }

    try {
      await fs.access(filePath);
    } catch (error) {
      throw new FetchError(
        `Downloaded file not found: ${filePath}`,
        reference,
        error,
      );
    }

    console.log(
      JSON.stringify({
        scope: "ytdlp_fetcher",
        action: "download_success",
        reference,
        file: path.basename(filePath),
      }),
    );

    return filePath;
  }

  private async run(
    action: string,
    reference: string,
    args: string[],
    cookies?: string,
  ): Promise<string> {
    const argv = [...args];
    if (cookies) {
      argv.push("--cookies", path.resolve(cookies));
    }
    argv.push(reference);

    console.log(
      JSON.stringify({
        scope: "ytdlp_fetcher",
        action: `${action}_start`,
        reference,
        with_cookies: Boolean(cookies),
      }),
    );

    try {
      return await runProcess(this.binary, argv, this.workDir);
    } catch (error) {
      console.error(
        JSON.stringify({
          scope: "ytdlp_fetcher",
          action: `${action}_error`,
          error_type: "fetch",
          reference,
          error: errorMessage(error),
        }),
      );
      throw new FetchError(
        `yt-dlp ${action} failed for ${reference}: ${errorMessage(error)}`,
        reference,
        error,
      );
    }
  }
}

function runProcess(cmd: string, argv: string[], cwd: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, argv, { cwd, stdio: ["ignore", "pipe", "pipe"] });

    let out = "";
    let err = "";
    child.stdout.on("data", (d: Buffer) => {
      out += d.toString();
    });
    child.stderr.on("data", (d: Buffer) => {
      err += d.toString();
    });

    child.on("error", (error) => {
      reject(new Error(`Failed to start ${cmd}: ${error.message}`));
    });

    child.on("close", (code) => {
      if (code === 0) {
        resolve(out);
      } else {
        reject(new Error(err.trim() || `${cmd} exited with code ${code}`));
      }
    });
  });
}
