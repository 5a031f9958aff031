import { splitRecipients, type OutgoingMessage } from './compose.js';

const CRLF = '\r\n';
const MAX_HEADER_LINE = 78;
const MAX_BODY_LINE = 998;
const BASE64_LINE = 76;
// "=?UTF-8?B?" + "?=" leaves 63 characters of base64, i.e. 45 raw bytes per word.
const ENCODED_WORD_BYTES = 45;

export type SendRequest = {
  raw: string;
  threadId?: string;
};

function sanitizeHeaderValue(value: string) {
  return value.replace(/[\r\n]+/g, ' ').trim();
}

function isAscii(value: string) {
  return /^[\x00-\x7F]*$/.test(value);
}

/** RFC 2047 B-encoding, split so no word exceeds 75 chars or cuts a UTF-8 sequence. */
export function encodeWords(value: string): string {
  if (isAscii(value)) return value;
  const words: string[] = [];
  let chunk = '';
  let chunkBytes = 0;
  for (const char of value) {
    const size = Buffer.byteLength(char, 'utf8');
    if (chunkBytes + size > ENCODED_WORD_BYTES && chunk) {
      words.push(chunk);
      chunk = '';
      chunkBytes = 0;
    }
    chunk += char;
    chunkBytes += size;
  }
  if (chunk) words.push(chunk);
  return words
    .map(word => `=?UTF-8?B?${Buffer.from(word, 'utf8').toString('base64')}?=`)
    .join(' ');
}

const NAMED_MAILBOX = /^(.*?)\s*(<[^<>]*>)$/;

/** Encodes non-ASCII display names in an address list; the addresses stay as typed. */
export function encodeAddressList(value: string): string {
  return splitRecipients(value)
    .map(entry => {
      if (isAscii(entry)) return entry;
      const named = entry.match(NAMED_MAILBOX);
      if (!named || !named[1]) return entry;
      const display = named[1].replace(/^"(.*)"$/, '$1').replace(/\\(.)/g, '$1');
      return `${encodeWords(display)} ${named[2]}`;
    })
    .join(', ');
}

/**
 * Folds at whitespace so lines stay within 78 chars where a break exists.
 * Removing the inserted CRLFs gives back the original value byte for byte.
 */
export function foldHeader(name: string, value: string): string {
  const line = `${name}: ${value}`;
  if (line.length <= MAX_HEADER_LINE) return line;
  const words = value.split(' ');
  const lines: string[] = [];
  let current = `${name}:`;
  for (const word of words) {
    const candidate = `${current} ${word}`;
    if (candidate.length > MAX_HEADER_LINE) {
      lines.push(current);
      current = ` ${word}`;
    } else {
      current = candidate;
    }
  }
  lines.push(current);
  return lines.join(CRLF);
}

function encodeBody(text: string): { encoding: '7bit' | 'base64'; content: string } {
  let normalized = text.replace(/\r\n|\r|\n/g, CRLF);
  if (!normalized.endsWith(CRLF)) normalized += CRLF;
  const fitsSevenBit = isAscii(normalized)
    && normalized.split(CRLF).every(line => line.length <= MAX_BODY_LINE);
  if (fitsSevenBit) {
    return { encoding: '7bit', content: normalized };
  }
  const encoded = Buffer.from(normalized, 'utf8').toString('base64');
  const lines: string[] = [];
  for (let i = 0; i < encoded.length; i += BASE64_LINE) {
    lines.push(encoded.slice(i, i + BASE64_LINE));
  }
  return { encoding: 'base64', content: `${lines.join(CRLF)}${CRLF}` };
}

export function serializeMessage(message: OutgoingMessage): string {
  const body = encodeBody(message.bodyText);
  const headers: Array<[string, string]> = [
    ['From', sanitizeHeaderValue(message.from)],
    ['To', encodeAddressList(sanitizeHeaderValue(message.to))],
    ['Subject', encodeWords(sanitizeHeaderValue(message.subject))]
  ];
  if (message.inReplyTo) headers.push(['In-Reply-To', sanitizeHeaderValue(message.inReplyTo)]);
  if (message.references) headers.push(['References', sanitizeHeaderValue(message.references)]);
  headers.push(
    ['MIME-Version', '1.0'],
    ['Content-Type', 'text/plain; charset=utf-8'],
    ['Content-Transfer-Encoding', body.encoding]
  );
  const head = headers.map(([name, value]) => foldHeader(name, value)).join(CRLF);
  return `${head}${CRLF}${CRLF}${body.content}`;
}

export function toSendRequest(message: OutgoingMessage): SendRequest {
  const raw = Buffer.from(serializeMessage(message), 'utf8').toString('base64url');
  return message.threadId ? { raw, threadId: message.threadId } : { raw };
}
