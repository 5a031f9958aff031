import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { composeMessage, composeReply, extractAddress, replySubject, splitRecipients } from '../gmail/compose.js';
import { AddressParseError } from '../util/errors.js';

const original = {
  from: 'Jane Doe <jane@example.com>',
  subject: 'Quarterly Report',
  messageId: '<abc@x>',
  references: undefined,
  threadId: 'thread-9'
};

describe('extractAddress', () => {
  it('strips the display name', () => {
    assert.equal(extractAddress('Jane Doe <jane@example.com>'), 'jane@example.com');
    assert.equal(extractAddress('"Doe, Jane" <jane@example.com>'), 'jane@example.com');
  });

  it('accepts a bare address and ignores comments', () => {
    assert.equal(extractAddress('jane@example.com'), 'jane@example.com');
    assert.equal(extractAddress('jane@example.com (Jane Doe)'), 'jane@example.com');
  });

  it('throws AddressParseError when no address is present', () => {
    assert.throws(() => extractAddress(''), AddressParseError);
    assert.throws(() => extractAddress('Jane Doe'), AddressParseError);
    assert.throws(() => extractAddress(undefined), AddressParseError);
  });
});

describe('replySubject', () => {
  it('prefixes once', () => {
    assert.equal(replySubject('Quarterly Report'), 'Re: Quarterly Report');
    assert.equal(replySubject('Re: Quarterly Report'), 'Re: Quarterly Report');
    assert.equal(replySubject('RE: budget'), 'RE: budget');
  });

  it('treats a missing subject as empty', () => {
    assert.equal(replySubject(undefined), 'Re: ');
  });
});

describe('composeReply', () => {
  it('addresses the sender and threads on the message id', () => {
    const reply = composeReply(original, 'Thanks, will review.');
    assert.deepStrictEqual({ ...reply }, {
      to: 'jane@example.com',
      from: 'me',
      subject: 'Re: Quarterly Report',
      bodyText: 'Thanks, will review.',
      inReplyTo: '<abc@x>',
      references: '<abc@x>',
      threadId: 'thread-9'
    });
  });

  it('appends to an existing References chain', () => {
    const reply = composeReply({ ...original, references: '<zzz@x>' }, 'ok');
    assert.equal(reply.references, '<zzz@x> <abc@x>');
    assert.equal(reply.inReplyTo, '<abc@x>');
  });

  it('omits threading headers without a message id', () => {
    const reply = composeReply({ ...original, messageId: undefined, references: '<zzz@x>' }, 'ok');
    assert.equal('inReplyTo' in reply, false);
    assert.equal('references' in reply, false);
    assert.equal(reply.threadId, 'thread-9');
  });

  it('keeps the body verbatim', () => {
    const text = '  Sounds good.\n\n> quoted line\n';
    assert.equal(composeReply(original, text).bodyText, text);
  });

  it('does not double-prefix the subject', () => {
    assert.equal(composeReply({ ...original, subject: 'Re: Quarterly Report' }, 'ok').subject, 'Re: Quarterly Report');
  });

  it('fails on an unparseable sender and builds nothing', () => {
    assert.throws(() => composeReply({ ...original, from: '' }, 'ok'), AddressParseError);
  });

  it('returns a frozen message', () => {
    assert.equal(Object.isFrozen(composeReply(original, 'ok')), true);
  });
});

describe('composeMessage', () => {
  it('builds an unthreaded message', () => {
    const message = composeMessage({ to: ' a@example.com ,b@example.org', subject: ' Lunch ', body: 'Friday?' });
    assert.deepStrictEqual({ ...message }, {
      to: 'a@example.com, b@example.org',
      from: 'me',
      subject: 'Lunch',
      bodyText: 'Friday?'
    });
  });

  it('keeps a comma inside a quoted display name', () => {
    const message = composeMessage({ to: '"Doe, Jane" <jane@example.com>, bob@example.org', subject: 'Hi', body: 'x' });
    assert.equal(message.to, '"Doe, Jane" <jane@example.com>, bob@example.org');
  });

  it('rejects a missing or invalid recipient', () => {
    assert.throws(() => composeMessage({ to: ' ', subject: 'x', body: 'y' }), AddressParseError);
    assert.throws(() => composeMessage({ to: 'bob', subject: 'x', body: 'y' }), /Invalid recipient: bob/);
  });
});

describe('splitRecipients', () => {
  it('splits on commas outside quotes', () => {
    assert.deepStrictEqual(
      splitRecipients(' a@example.com ,"Doe, \\"JD\\", Jane" <jane@example.com>,, b@example.org '),
      ['a@example.com', '"Doe, \\"JD\\", Jane" <jane@example.com>', 'b@example.org']
    );
  });
});
