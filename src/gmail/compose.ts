import { AddressParseError } from '../util/errors.js';
import type { EmailRecord } from './record.js';

/** Gmail substitutes the authenticated account for this literal. */
export const SENDER_IDENTITY = 'me';

export type OutgoingMessage = Readonly<{
  to: string;
  from: string;
  subject: string;
  bodyText: string;
  inReplyTo?: string;
  references?: string;
  threadId?: string;
}>;

export type ComposeForm = {
  to: string;
  subject: string;
  body: string;
};

type ReplySource = Pick<EmailRecord, 'from' | 'subject' | 'messageId' | 'references' | 'threadId'>;

const ANGLE_ADDRESS = /<\s*([^<>\s@]+@[^<>\s@]+)\s*>/;
const BARE_ADDRESS = /[^\s<>"'(),;:[\]]+@[^\s<>"'(),;:[\]]+/;

/**
 * Pulls the bare address out of a From/To style header:
 * `Jane Doe <jane@example.com>` -> `jane@example.com`.
 */
export function extractAddress(header: string | null | undefined): string {
  const value = (header ?? '').trim();
  const angle = value.match(ANGLE_ADDRESS);
  if (angle) return angle[1];
  const bare = value.replace(/\([^)]*\)/g, ' ').match(BARE_ADDRESS);
  if (bare) return bare[0];
  throw new AddressParseError(value);
}

export function replySubject(subject: string | null | undefined) {
  const original = subject ?? '';
  return original.toLowerCase().startsWith('re:') ? original : `Re: ${original}`;
}

export function composeReply(original: ReplySource, bodyText: string): OutgoingMessage {
  const to = extractAddress(original.from);
  const threading: { inReplyTo?: string; references?: string } = {};
  if (original.messageId) {
    threading.inReplyTo = original.messageId;
    threading.references = original.references
      ? `${original.references} ${original.messageId}`
      : original.messageId;
  }
  return Object.freeze({
    to,
    from: SENDER_IDENTITY,
    subject: replySubject(original.subject),
    bodyText,
    ...threading,
    threadId: original.threadId || undefined
  });
}

/** Splits an address list on commas that sit outside quoted display names. */
export function splitRecipients(value: string): string[] {
  const recipients: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (char === '\\' && quoted && i + 1 < value.length) {
      current += char + value[i + 1];
      i++;
      continue;
    }
    if (char === '"') quoted = !quoted;
    if (char === ',' && !quoted) {
      recipients.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  recipients.push(current);
  return recipients.map(item => item.trim()).filter(Boolean);
}

/** Compose-new path: no threading headers and no thread hint. */
export function composeMessage(form: ComposeForm): OutgoingMessage {
  const recipients = splitRecipients(form.to);
  if (!recipients.length) {
    throw new AddressParseError(form.to, 'Add at least one recipient.');
  }
  for (const recipient of recipients) {
    if (!BARE_ADDRESS.test(recipient)) {
      throw new AddressParseError(recipient, `Invalid recipient: ${recipient}`);
    }
  }
  return Object.freeze({
    to: recipients.join(', '),
    from: SENDER_IDENTITY,
    subject: form.subject.trim(),
    bodyText: form.body
  });
}

export function emptyComposeForm(): ComposeForm {
  return { to: '', subject: '', body: '' };
}
