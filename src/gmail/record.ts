import type { gmail_v1 } from 'googleapis';
import { headerValue, toHeaders, type MessageHeader } from './headers.js';
import { extractBodies, toBodyPart, type BodyPart } from './mime.js';

export type RawMessage = {
  id: string;
  threadId: string;
  labelIds: string[];
  headers: MessageHeader[];
  bodyTree: BodyPart;
  snippet: string;
};

export type EmailRecord = Readonly<{
  id: string;
  threadId: string;
  labelIds: readonly string[];
  from?: string;
  to?: string;
  subject?: string;
  date?: string;
  messageId?: string;
  inReplyTo?: string;
  references?: string;
  plainText: string;
  htmlText: string;
  snippet: string;
}>;

/** Returns null when Gmail hands back a message without an id. */
export function rawFromGmail(msg: gmail_v1.Schema$Message): RawMessage | null {
  if (!msg.id) return null;
  return {
    id: msg.id,
    threadId: msg.threadId ?? msg.id,
    labelIds: (msg.labelIds ?? []).filter(Boolean),
    headers: toHeaders(msg.payload?.headers),
    bodyTree: toBodyPart(msg.payload),
    snippet: msg.snippet ?? ''
  };
}

function present(value: string | undefined) {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export function toEmailRecord(raw: RawMessage): EmailRecord {
  const { plainText, htmlText } = extractBodies(raw.bodyTree);
  const h = (name: string) => present(headerValue(raw.headers, name));
  return Object.freeze({
    id: raw.id,
    threadId: raw.threadId,
    labelIds: Object.freeze([...raw.labelIds]),
    from: h('From'),
    to: h('To'),
    subject: h('Subject'),
    date: h('Date'),
    messageId: h('Message-ID'),
    inReplyTo: h('In-Reply-To'),
    references: h('References'),
    plainText,
    htmlText,
    snippet: raw.snippet
  });
}

export function isUnread(record: EmailRecord) {
  return record.labelIds.includes('UNREAD');
}
