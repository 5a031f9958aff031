import type { gmail_v1 } from 'googleapis';

export type MessageHeader = { name: string; value: string };

export function toHeaders(raw: gmail_v1.Schema$MessagePartHeader[] | null | undefined): MessageHeader[] {
  if (!raw?.length) return [];
  return raw
    .filter((h): h is gmail_v1.Schema$MessagePartHeader & { name: string } => Boolean(h?.name))
    .map(h => ({ name: h.name, value: h.value ?? '' }));
}

/** Case-insensitive lookup; the first header with the name wins. */
export function headerValue(headers: readonly MessageHeader[] | undefined, name: string): string | undefined {
  if (!headers?.length) return undefined;
  const wanted = name.toLowerCase();
  return headers.find(h => h.name.toLowerCase() === wanted)?.value;
}
