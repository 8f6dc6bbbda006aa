/**
 * Reference canonicalization and identifier extraction
 *
 * Two references that denote the same media item must produce the same
 * identifier: short links, /shorts/ paths and playlist-qualified watch URLs
 * all collapse onto the watch URL's video id.
 */

const YOUTUBE_HOSTS = new Set([
  "youtube.com",
  "www.youtube.com",
  "m.youtube.com",
  "music.youtube.com",
]);

const YOUTUBE_ID = /^[A-Za-z0-9_-]{11}$/;

export function isRemoteReference(reference: string): boolean {
  return /^https?:\/\//i.test(reference.trim());
}

function parseUrl(reference: string): URL | null {
  try {
    return new URL(reference.trim());
  } catch {
    return null;
  }
}

function youtubeId(url: URL): string | null {
  const host = url.hostname.toLowerCase();

  if (host === "youtu.be") {
    const id = url.pathname.split("/")[1] ?? "";
    return YOUTUBE_ID.test(id) ? id : null;
  }

  if (!YOUTUBE_HOSTS.has(host)) {
    return null;
  }

  if (url.pathname === "/watch") {
    const id = url.searchParams.get("v") ?? "";
    return YOUTUBE_ID.test(id) ? id : null;
  }

  const match = url.pathname.match(/^\/(shorts|live|embed|v)\/([^/?#]+)/);
  if (match && YOUTUBE_ID.test(match[2])) {
    return match[2];
  }
  return null;
}

/**
 * Rewrite short-form variants to the canonical long form.
 * Non-YouTube references are returned trimmed but otherwise untouched.
 */
export function canonicalizeReference(reference: string): string {
  const trimmed = reference.trim();
  const url = parseUrl(trimmed);
  if (!url) {
    return trimmed;
  }

  const id = youtubeId(url);
  if (id) {
    return `https://www.youtube.com/watch?v=${id}`;
  }
  return trimmed;
}

/**
 * Extract the stable identifier for a remote reference.
 * Unrecognized URLs fall back to the canonical URL itself.
 */
export function extractIdentifier(reference: string): string {
  const canonical = canonicalizeReference(reference);
  const url = parseUrl(canonical);
  if (!url) {
    return canonical;
  }

  const yt = youtubeId(url);
  if (yt) {
    return yt;
  }

  const host = url.hostname.toLowerCase();

  if (host.endsWith("tiktok.com")) {
    const match = url.pathname.match(/\/video\/(\d+)/);
    if (match) return match[1];
  }

  if (host === "clips.twitch.tv") {
    const slug = url.pathname.split("/")[1];
    if (slug) return slug;
  }

  if (host.endsWith("twitch.tv")) {
    const vod = url.pathname.match(/\/videos\/(\d+)/);
    if (vod) return vod[1];
    const clip = url.pathname.match(/\/clip\/([^/?#]+)/);
    if (clip) return clip[1];
  }

  if (host.endsWith("sooplive.co.kr") || host.endsWith("afreecatv.com")) {
    const vod = url.pathname.match(/\/player\/(\d+)/) ?? url.pathname.match(/\/(\d+)\/?$/);
    if (vod) return vod[1];
  }

  return canonical;
}

/**
 * Account name of a TikTok feed URL (tiktok.com/@name), if any
 */
export function feedAccountName(reference: string): string | null {
  const match = reference.match(/tiktok\.com\/@([^/?#]+)/i);
  return match ? match[1] : null;
}
