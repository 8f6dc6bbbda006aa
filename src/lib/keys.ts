/**
 * Deterministic storage keys for archived scan output
 */

// URL-shaped identifiers must not introduce extra path segments
const segment = (id: string) => encodeURIComponent(id);

export const keys = {
  detections: (id: string, eventClass: number) =>
    `detections/${segment(id)}/${eventClass}.json`,
  runSummary: (startedAt: string) => `runs/${startedAt}/summary.json`,
} as const;
