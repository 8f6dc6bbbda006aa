/**
 * Reference resolver: turns a raw batch source into an ordered,
 * deduplicated list of media references.
 *
 * Source-kind detection lives only here; everything downstream sees the
 * same identifier sequence whatever the source was.
 */

import { promises as fs } from "fs";
import path from "path";
import { ResolutionError, errorMessage, isMissingFile } from "./errors";
import { Fetcher } from "./fetcher";
import {
  canonicalizeReference,
  extractIdentifier,
  feedAccountName,
  isRemoteReference,
} from "./identifiers";
import { MediaReference, ResolvedBatch, SourceKind } from "../types/pipeline";

export interface ResolverDeps {
  fetcher: Fetcher;
  workDir: string;
  cookies?: string;
}

export function detectSourceKind(source: string): SourceKind {
  const lower = source.toLowerCase();

  if (lower.endsWith(".txt") && !isRemoteReference(source)) {
    return "list_file";
  }
  if (lower.includes("youtube.com/playlist?") || lower.includes("&list=")) {
    return "playlist";
  }
  if (
    lower.includes("youtube.com/@") ||
    lower.includes("youtube.com/c/") ||
    lower.includes("youtube.com/user/") ||
    lower.includes("youtube.com/channel/")
  ) {
    return "channel";
  }
  if (lower.includes("tiktok.com/@") && !lower.includes("/video/")) {
    return "account_feed";
  }
  return "explicit";
}

/**
 * One reference per line; blank lines and # comments are ignored
 */
export function parseListText(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

export function feedCachePath(workDir: string, account: string): string {
  return path.join(workDir, `feed-${account}.txt`);
}

export async function resolveBatch(
  sources: string[],
  deps: ResolverDeps,
): Promise<ResolvedBatch> {
  const first = sources[0];
  if (!first) {
    throw new ResolutionError("No batch source given", "");
  }

  const kind = detectSourceKind(first);
  const raw = await collectRaw(kind, first, sources, deps);
  const references = await toReferences(raw);

  if (references.length === 0) {
    console.error(
      JSON.stringify({
        scope: "resolver",
        status: "error",
        error_type: "resolution",
        source: first,
        kind,
        raw_count: raw.length,
      }),
    );
    throw new ResolutionError(`No media references found in ${first}`, first);
  }

  const mode = kind === "explicit" && references.length === 1 ? "single" : "batch";

  console.log(
    JSON.stringify({
      scope: "resolver",
      action: "resolved",
      source: first,
      kind,
      mode,
      raw_count: raw.length,
      unique_count: references.length,
    }),
  );

  return { kind, mode, source: first, references };
}

async function collectRaw(
  kind: SourceKind,
  first: string,
  sources: string[],
  deps: ResolverDeps,
): Promise<string[]> {
  switch (kind) {
    case "explicit":
      return sources;

    case "list_file":
      try {
        return parseListText(await fs.readFile(first, "utf-8"));
      } catch (error) {
        throw new ResolutionError(
          `Cannot read list file ${first}: ${errorMessage(error)}`,
          first,
        );
      }

    case "playlist":
    case "channel":
      return listOrEmpty(first, deps);

    case "account_feed":
      return readAccountFeed(first, deps);
  }
}

async function listOrEmpty(source: string, deps: ResolverDeps): Promise<string[]> {
  try {
    return await deps.fetcher.listEntries(source, deps.cookies);
  } catch (error) {
    console.error(
      JSON.stringify({
        scope: "resolver",
        action: "list_entries_failed",
        source,
        error: errorMessage(error),
      }),
    );
    return [];
  }
}

/**
 * Account feeds are listed once and saved; later runs reuse the saved list
 */
async function readAccountFeed(
  source: string,
  deps: ResolverDeps,
): Promise<string[]> {
  const account = feedAccountName(source) ?? "unknown";
  const cachePath = feedCachePath(deps.workDir, account);

  let saved: string | null = null;
  try {
    saved = await fs.readFile(cachePath, "utf-8");
  } catch (error) {
    // Not listed yet
    if (!isMissingFile(error)) {
      throw new ResolutionError(
        `Cannot read saved feed ${cachePath}: ${errorMessage(error)}`,
        source,
      );
    }
  }

  if (saved !== null) {
    const cached = parseListText(saved);
    if (cached.length > 0) {
      console.log(
        JSON.stringify({
          scope: "resolver",
          action: "feed_cache_hit",
          account,
          path: cachePath,
          count: cached.length,
        }),
      );
      return cached;
    }
  }

  const urls = await listOrEmpty(source, deps);
  if (urls.length > 0) {
    await fs.writeFile(cachePath, urls.join("\n") + "\n", "utf-8");
    console.log(
      JSON.stringify({
        scope: "resolver",
        action: "feed_cache_saved",
        account,
        path: cachePath,
        count: urls.length,
      }),
    );
  }
  return urls;
}

async function toReferences(raw: string[]): Promise<MediaReference[]> {
  const seen = new Set<string>();
  const references: MediaReference[] = [];

  for (const entry of raw) {
    const ref = await toReference(entry);
    if (!ref || seen.has(ref.identifier)) {
      continue;
    }
    seen.add(ref.identifier);
    references.push(ref);
  }
  return references;
}

async function toReference(entry: string): Promise<MediaReference | null> {
  const value = entry.trim();
  if (!value) {
    return null;
  }

  if (isRemoteReference(value)) {
    return {
      identifier: extractIdentifier(value),
      reference: canonicalizeReference(value),
      local: false,
    };
  }

  const absolute = path.resolve(value);
  try {
    await fs.access(absolute);
  } catch {
    console.error(
      JSON.stringify({
        scope: "resolver",
        action: "local_file_missing",
        path: absolute,
      }),
    );
    return null;
  }
  return { identifier: absolute, reference: absolute, local: true };
}
