import { clampMaxResults } from '../gmail/client.js';
import { composeMessage, composeReply, emptyComposeForm, type ComposeForm, type OutgoingMessage } from '../gmail/compose.js';
import { fetchRecords } from '../gmail/fetch.js';
import type { Mailbox } from '../gmail/mailbox.js';
import { toEmailRecord, type EmailRecord } from '../gmail/record.js';
import { toSendRequest } from '../gmail/serialize.js';
import type { ReplyDrafter } from '../llm/replyDraft.js';
import { AddressParseError, type ProviderError } from '../util/errors.js';
import { notice, type InboxState, type Notice } from './state.js';

export type ListingInput = {
  query: string;
  maxResults: unknown;
};

function describeProviderError(err: ProviderError) {
  if (err.isAuthFailure) {
    return `Gmail rejected the request (${err.status}). Reconnect your Google account and try again.`;
  }
  return err.status ? `Gmail API error (${err.status}): ${err.message}` : err.message;
}

/**
 * Runs a search and replaces the cached listing wholesale. On failure the
 * previous listing is kept.
 */
export async function fetchListing(
  mailbox: Mailbox,
  state: InboxState,
  input: ListingInput,
  now = Date.now()
): Promise<{ state: InboxState; notices: Notice[] }> {
  const query = input.query.trim();
  const maxResults = clampMaxResults(input.maxResults, state.maxResults);
  const result = await mailbox.search(query, maxResults);
  if (!result.ok) {
    return {
      state: { ...state, query, maxResults },
      notices: [notice.error(describeProviderError(result.error))]
    };
  }
  return {
    state: { query, maxResults, messageIds: result.value, fetchedAt: now },
    notices: [notice.success(`Fetched ${result.value.length} message(s).`)]
  };
}

export async function loadInbox(
  mailbox: Mailbox,
  state: InboxState
): Promise<{ records: EmailRecord[]; notices: Notice[] }> {
  if (!state.messageIds.length) return { records: [], notices: [] };
  const { records, failures } = await fetchRecords(mailbox, state.messageIds);
  return {
    records,
    notices: failures.map(f => notice.warning(`Failed to load message ${f.id}: ${describeProviderError(f.error)}`))
  };
}

export async function loadMessage(
  mailbox: Mailbox,
  id: string
): Promise<{ record: EmailRecord | null; notices: Notice[] }> {
  const result = await mailbox.getMessage(id);
  if (!result.ok) {
    return { record: null, notices: [notice.error(`Failed to load message ${id}: ${describeProviderError(result.error)}`)] };
  }
  return { record: toEmailRecord(result.value), notices: [] };
}

export async function prepareDraft(
  mailbox: Mailbox,
  drafter: ReplyDrafter,
  id: string
): Promise<{ record: EmailRecord | null; draft: string; notices: Notice[] }> {
  const loaded = await loadMessage(mailbox, id);
  if (!loaded.record) return { record: null, draft: '', notices: loaded.notices };
  const draft = await drafter(loaded.record);
  const notices = draft.degraded
    ? [notice.warning('The AI draft is unavailable; edit the reply by hand.')]
    : [];
  return { record: loaded.record, draft: draft.text, notices };
}

/**
 * Threads `body` as a reply to message `id`, then marks the original read.
 * The read-marker is best effort and never undoes a successful send.
 */
export async function sendReply(
  mailbox: Mailbox,
  id: string,
  body: string
): Promise<{ sentId: string | null; notices: Notice[] }> {
  if (!body.trim()) {
    return { sentId: null, notices: [notice.error('Reply body is empty.')] };
  }
  const loaded = await loadMessage(mailbox, id);
  if (!loaded.record) return { sentId: null, notices: loaded.notices };

  let outgoing: OutgoingMessage;
  try {
    outgoing = composeReply(loaded.record, body);
  } catch (err) {
    if (err instanceof AddressParseError) {
      return { sentId: null, notices: [notice.error(`Failed to send reply: ${err.message}`)] };
    }
    throw err;
  }

  const sent = await mailbox.send(toSendRequest(outgoing));
  if (!sent.ok) {
    return { sentId: null, notices: [notice.error(`Failed to send reply: ${describeProviderError(sent.error)}`)] };
  }

  const notices = [notice.success(`Reply sent (Message ID: ${sent.value})`)];
  const marked = await mailbox.modifyLabels(id, { removeLabelIds: ['UNREAD'] });
  if (!marked.ok) {
    console.warn('failed to mark replied message read', { id, error: marked.error.message });
    notices.push(notice.warning(`Reply sent, but the original could not be marked read: ${describeProviderError(marked.error)}`));
  }
  return { sentId: sent.value, notices };
}

/** Returns a cleared form on success and the submitted form otherwise. */
export async function sendNewMessage(
  mailbox: Mailbox,
  form: ComposeForm
): Promise<{ form: ComposeForm; sentId: string | null; notices: Notice[] }> {
  let outgoing: OutgoingMessage;
  try {
    outgoing = composeMessage(form);
  } catch (err) {
    if (err instanceof AddressParseError) {
      return { form, sentId: null, notices: [notice.error(`Failed to send new email: ${err.message}`)] };
    }
    throw err;
  }
  const sent = await mailbox.send(toSendRequest(outgoing));
  if (!sent.ok) {
    return { form, sentId: null, notices: [notice.error(`Failed to send new email: ${describeProviderError(sent.error)}`)] };
  }
  return { form: emptyComposeForm(), sentId: sent.value, notices: [notice.success('New email sent.')] };
}

export function clearCompose(): ComposeForm {
  return emptyComposeForm();
}
