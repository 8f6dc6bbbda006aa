/**
 * Type guards and validation for values coming from outside the process
 * (yt-dlp JSON, sidecar responses, environment and event payloads)
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(v: unknown): v is JsonRecord {
  return v != null && typeof v === "object" && !Array.isArray(v);
}

/**
 * Ensure value is a plain object, throw descriptive error if not
 */
export function ensureRecord(v: unknown, name: string): JsonRecord {
  if (!isRecord(v)) {
    throw new Error(
      `Expected object for ${name}, got ${describe(v)}`,
    );
  }
  return v;
}

export function ensureArray(v: unknown, name: string): unknown[] {
  if (!Array.isArray(v)) {
    throw new Error(`Expected array for ${name}, got ${describe(v)}`);
  }
  return v;
}

export function ensureString(v: unknown, name: string): string {
  if (typeof v !== "string") {
    throw new Error(`Expected string for ${name}, got ${describe(v)}`);
  }
  return v;
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Parse a positive integer from an env var or CLI flag, falling back when unset
 */
export function parsePositiveInt(
  raw: string | undefined,
  name: string,
  fallback: number,
): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Expected positive integer for ${name}, got "${raw}"`);
  }
  return value;
}

/**
 * Parse a confidence threshold in percent (0-100)
 */
export function parseThreshold(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    throw new Error(`Expected threshold between 0 and 100, got "${raw}"`);
  }
  return value;
}

function describe(v: unknown): string {
  if (v == null) return "null/undefined";
  if (Array.isArray(v)) return "array";
  return typeof v;
}
