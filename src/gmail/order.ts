export const UNKNOWN_DATE = Number.NEGATIVE_INFINITY;

const TRAILING_ZONE_NAME = /(\d{1,2}:\d{2}(?::\d{2})?)\s+[A-Za-z]{1,5}$/;

/**
 * Parses an RFC-5322 Date header (or an ISO date) into epoch milliseconds.
 * Missing or unparseable values map to UNKNOWN_DATE so they sort as oldest.
 */
export function parseMailDate(raw: string | null | undefined): number {
  if (!raw) return UNKNOWN_DATE;
  // Date headers may carry a trailing comment such as "(UTC)".
  const cleaned = raw.replace(/\([^)]*\)/g, ' ').replace(/\s+/g, ' ').trim();
  if (!cleaned) return UNKNOWN_DATE;
  let ts = Date.parse(cleaned);
  if (Number.isNaN(ts)) {
    // Unknown alphabetic zones ("CEST", "BST") read as -0000.
    ts = Date.parse(cleaned.replace(TRAILING_ZONE_NAME, '$1 -0000'));
  }
  return Number.isNaN(ts) ? UNKNOWN_DATE : ts;
}

/** Newest first. Ties keep their incoming order. */
export function orderByDate<T extends { date?: string }>(records: readonly T[]): T[] {
  return records
    .map((record, index) => ({ record, index, ts: parseMailDate(record.date) }))
    .sort((a, b) => {
      if (a.ts !== b.ts) return a.ts > b.ts ? -1 : 1;
      return a.index - b.index;
    })
    .map(entry => entry.record);
}

function pad(value: number) {
  return String(value).padStart(2, '0');
}

export function formatMailDate(raw: string | null | undefined): string {
  const ts = parseMailDate(raw);
  if (ts === UNKNOWN_DATE) return 'unknown date';
  const d = new Date(ts);
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}
