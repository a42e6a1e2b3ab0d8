/**
 * Timestamp parsing for one-time schedules and interval start times.
 *
 * Layer 1: ISO 8601 (plus the "YYYY-MM-DD HH:MM:SS UTC" form)
 * Layer 2: chrono-node for natural language ("tomorrow at 9am", "in 2 hours")
 *
 * Times without an explicit zone are read as UTC.
 */

import * as chrono from "chrono-node";

const ISO_DATE_TIME_RE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?(Z|[+-]\d{2}:\d{2})?$/i;

/**
 * Normalize common timestamp spellings to ISO 8601.
 * - "2025-12-25 10:00:00 UTC" → "2025-12-25T10:00:00Z"
 * - a zoneless date-time gets a trailing "Z"
 */
export function normalizeIso(value: string): string {
  let v = value.trim();
  if (/\s+UTC$/i.test(v)) {
    v = `${v.replace(/\s+UTC$/i, "").trim()}Z`;
  }
  const match = v.match(ISO_DATE_TIME_RE);
  if (!match) return v;

  v = v.replace(" ", "T");
  if (!match[1]) {
    // Date-only or zoneless date-time: pin to UTC.
    v = v.includes("T") ? `${v}Z` : `${v}T00:00:00Z`;
  }
  return v;
}

/**
 * Parse a timestamp string. Returns null when neither layer understands it.
 */
export function parseTimestamp(input: string, ref: Date = new Date()): Date | null {
  const trimmed = input.trim();
  if (!trimmed) return null;

  const normalized = normalizeIso(trimmed);
  if (ISO_DATE_TIME_RE.test(normalized)) {
    const iso = new Date(normalized);
    return Number.isNaN(iso.getTime()) ? null : iso;
  }

  const parsed = chrono.parseDate(trimmed, { instant: ref, timezone: 0 }, { forwardDate: true });
  return parsed ?? null;
}
