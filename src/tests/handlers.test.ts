import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { failed, ok } from '../gmail/mailbox.js';
import {
  clearCompose,
  fetchListing,
  loadInbox,
  prepareDraft,
  sendNewMessage,
  sendReply
} from '../inbox/handlers.js';
import type { InboxState } from '../inbox/state.js';
import type { ReplyDrafter } from '../llm/replyDraft.js';
import { ProviderError } from '../util/errors.js';
import { FakeMailbox, decodeRaw, rawMessage } from './fakes.js';

const baseState: InboxState = {
  query: 'is:unread',
  maxResults: 10,
  messageIds: ['old-1', 'old-2'],
  fetchedAt: 1
};

function original() {
  return rawMessage('m1', {
    From: 'Jane Doe <jane@example.com>',
    Subject: 'Quarterly Report',
    'Message-ID': '<abc@x>',
    References: '<zzz@x>',
    Date: 'Mon, 01 Jan 2024 09:00:00 +0000'
  }, { threadId: 'thread-9' });
}

describe('fetchListing', () => {
  it('replaces the cached listing wholesale', async () => {
    const mailbox = new FakeMailbox();
    mailbox.searchResult = ok(['n1', 'n2']);
    const result = await fetchListing(mailbox, baseState, { query: ' newer_than:7d ', maxResults: '5' }, 42);
    assert.deepStrictEqual(result.state, { query: 'newer_than:7d', maxResults: 5, messageIds: ['n1', 'n2'], fetchedAt: 42 });
    assert.deepStrictEqual(result.notices, [{ level: 'success', text: 'Fetched 2 message(s).' }]);
    assert.deepStrictEqual(mailbox.searches, [{ query: 'newer_than:7d', maxResults: 5 }]);
  });

  it('clamps the result bound', async () => {
    const mailbox = new FakeMailbox();
    await fetchListing(mailbox, baseState, { query: '', maxResults: '500' });
    await fetchListing(mailbox, baseState, { query: '', maxResults: '0' });
    await fetchListing(mailbox, baseState, { query: '', maxResults: 'lots' });
    assert.deepStrictEqual(mailbox.searches.map(s => s.maxResults), [50, 1, 10]);
  });

  it('keeps the previous listing when the search fails', async () => {
    const mailbox = new FakeMailbox();
    mailbox.searchResult = failed(new ProviderError('search', 'boom', { status: 500 }));
    const result = await fetchListing(mailbox, baseState, { query: 'from:bob', maxResults: '10' });
    assert.deepStrictEqual(result.state.messageIds, ['old-1', 'old-2']);
    assert.deepStrictEqual(result.notices, [{ level: 'error', text: 'Gmail API error (500): boom' }]);
  });
});

describe('loadInbox', () => {
  it('reports each failed message and returns the rest newest first', async () => {
    const mailbox = new FakeMailbox([
      rawMessage('m1', { Date: '2024-01-01' }),
      rawMessage('m3', { Date: '2024-01-03' })
    ]).failGet('m2', 500, 'backend unavailable');
    const result = await loadInbox(mailbox, { ...baseState, messageIds: ['m1', 'm2', 'm3'] });
    assert.deepStrictEqual(result.records.map(r => r.id), ['m3', 'm1']);
    assert.deepStrictEqual(result.notices, [
      { level: 'warning', text: 'Failed to load message m2: Gmail API error (500): backend unavailable' }
    ]);
  });

  it('does not call Gmail for an empty listing', async () => {
    const mailbox = new FakeMailbox();
    const result = await loadInbox(mailbox, { ...baseState, messageIds: [] });
    assert.deepStrictEqual(result, { records: [], notices: [] });
    assert.deepStrictEqual(mailbox.getCalls, []);
  });
});

describe('prepareDraft', () => {
  it('passes the record to the drafter', async () => {
    const mailbox = new FakeMailbox([original()]);
    const seen: string[] = [];
    const drafter: ReplyDrafter = async record => {
      seen.push(record.plainText);
      return { text: 'Happy to help.', degraded: false };
    };
    const result = await prepareDraft(mailbox, drafter, 'm1');
    assert.equal(result.draft, 'Happy to help.');
    assert.deepStrictEqual(result.notices, []);
    assert.deepStrictEqual(seen, ['Body of m1']);
  });

  it('flags a placeholder draft', async () => {
    const mailbox = new FakeMailbox([original()]);
    const result = await prepareDraft(mailbox, async () => ({ text: '(Draft error: timeout)', degraded: true }), 'm1');
    assert.equal(result.draft, '(Draft error: timeout)');
    assert.deepStrictEqual(result.notices, [
      { level: 'warning', text: 'The AI draft is unavailable; edit the reply by hand.' }
    ]);
  });
});

describe('sendReply', () => {
  it('sends a threaded reply and marks the original read', async () => {
    const mailbox = new FakeMailbox([original()]);
    const result = await sendReply(mailbox, 'm1', 'Thanks, looks good.');

    assert.equal(result.sentId, 'sent-1');
    assert.deepStrictEqual(result.notices, [{ level: 'success', text: 'Reply sent (Message ID: sent-1)' }]);
    assert.equal(mailbox.sent.length, 1);
    assert.equal(mailbox.sent[0].threadId, 'thread-9');
    const lines = decodeRaw(mailbox.sent[0]).split('\r\n');
    assert.ok(lines.includes('To: jane@example.com'));
    assert.ok(lines.includes('Subject: Re: Quarterly Report'));
    assert.ok(lines.includes('In-Reply-To: <abc@x>'));
    assert.ok(lines.includes('References: <zzz@x> <abc@x>'));
    assert.deepStrictEqual(mailbox.modified, [{ id: 'm1', delta: { removeLabelIds: ['UNREAD'] } }]);
  });

  it('keeps the send when marking read fails', async () => {
    const mailbox = new FakeMailbox([original()]);
    mailbox.modifyResult = failed(new ProviderError('modify', 'quota exceeded', { status: 429 }));
    const result = await sendReply(mailbox, 'm1', 'ok');
    assert.equal(result.sentId, 'sent-1');
    assert.deepStrictEqual(result.notices, [
      { level: 'success', text: 'Reply sent (Message ID: sent-1)' },
      { level: 'warning', text: 'Reply sent, but the original could not be marked read: Gmail API error (429): quota exceeded' }
    ]);
    assert.equal(mailbox.sent.length, 1);
  });

  it('stops before sending when the sender address is unusable', async () => {
    const mailbox = new FakeMailbox([rawMessage('m1', { From: 'Mailer Daemon', Subject: 'Bounce' })]);
    const result = await sendReply(mailbox, 'm1', 'hello?');
    assert.equal(result.sentId, null);
    assert.deepStrictEqual(result.notices, [
      { level: 'error', text: "Failed to send reply: Couldn't parse the original sender address." }
    ]);
    assert.deepStrictEqual(mailbox.sent, []);
    assert.deepStrictEqual(mailbox.modified, []);
  });

  it('rejects an empty body', async () => {
    const mailbox = new FakeMailbox([original()]);
    const result = await sendReply(mailbox, 'm1', '   ');
    assert.deepStrictEqual(result.notices, [{ level: 'error', text: 'Reply body is empty.' }]);
    assert.deepStrictEqual(mailbox.getCalls, []);
  });

  it('reports a failed send without marking read', async () => {
    const mailbox = new FakeMailbox([original()]);
    mailbox.sendResult = failed(new ProviderError('send', 'Invalid To header', { status: 400 }));
    const result = await sendReply(mailbox, 'm1', 'ok');
    assert.equal(result.sentId, null);
    assert.deepStrictEqual(result.notices, [
      { level: 'error', text: 'Failed to send reply: Gmail API error (400): Invalid To header' }
    ]);
    assert.deepStrictEqual(mailbox.modified, []);
  });

  it('reports an auth failure as a reconnect hint', async () => {
    const mailbox = new FakeMailbox().failGet('m1', 401, 'Invalid Credentials');
    const result = await sendReply(mailbox, 'm1', 'ok');
    assert.deepStrictEqual(result.notices, [
      { level: 'error', text: 'Failed to load message m1: Gmail rejected the request (401). Reconnect your Google account and try again.' }
    ]);
  });
});

describe('sendNewMessage', () => {
  it('clears the form after a successful send', async () => {
    const mailbox = new FakeMailbox();
    const result = await sendNewMessage(mailbox, { to: 'sam@example.com', subject: 'Hi', body: 'Hello Sam' });
    assert.deepStrictEqual(result.form, clearCompose());
    assert.deepStrictEqual(result.notices, [{ level: 'success', text: 'New email sent.' }]);
    assert.equal('threadId' in mailbox.sent[0], false);
    assert.ok(decodeRaw(mailbox.sent[0]).split('\r\n').includes('To: sam@example.com'));
  });

  it('keeps the form when the send fails', async () => {
    const mailbox = new FakeMailbox();
    mailbox.sendResult = failed(new ProviderError('send', 'offline'));
    const form = { to: 'sam@example.com', subject: 'Hi', body: 'Hello Sam' };
    const result = await sendNewMessage(mailbox, form);
    assert.deepStrictEqual(result.form, form);
    assert.deepStrictEqual(result.notices, [{ level: 'error', text: 'Failed to send new email: offline' }]);
  });

  it('keeps the form when the recipient is invalid', async () => {
    const mailbox = new FakeMailbox();
    const form = { to: 'sam', subject: 'Hi', body: 'Hello Sam' };
    const result = await sendNewMessage(mailbox, form);
    assert.deepStrictEqual(result.notices, [{ level: 'error', text: 'Failed to send new email: Invalid recipient: sam' }]);
    assert.deepStrictEqual(mailbox.sent, []);
  });
});
