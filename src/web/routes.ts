import { Router, type NextFunction, type Request, type Response } from 'express';
import { getAuthedClient, redirectForPrecondition } from '../auth/google.js';
import { hasClientConfig } from '../auth/credentials.js';
import {
  pushNotices,
  readInboxState,
  readTokens,
  readUser,
  takeNotices,
  writeInboxState
} from '../auth/session.js';
import { gmailClient } from '../gmail/client.js';
import type { ComposeForm } from '../gmail/compose.js';
import { GmailMailbox, type Mailbox } from '../gmail/mailbox.js';
import {
  clearCompose,
  fetchListing,
  loadInbox,
  loadMessage,
  prepareDraft,
  sendNewMessage,
  sendReply
} from '../inbox/handlers.js';
import { generateReplyDraft } from '../llm/replyDraft.js';
import { PreconditionError, errorMessage } from '../util/errors.js';
import { createTraceId, scopedLogger } from '../util/log.js';
import { renderComposePage, renderConnectPage, renderInboxPage, renderMessagePage } from './views.js';

export const router = Router();

type MailHandler = (req: Request, res: Response, mailbox: Mailbox) => Promise<unknown>;

/**
 * Resolves the user's mailbox before the handler runs. A missing or
 * under-scoped credential stops the request here, before any Gmail call.
 */
function withMailbox(name: string, handler: MailHandler) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const log = scopedLogger(`${name}:${createTraceId()}`);
    let mailbox: Mailbox;
    try {
      mailbox = new GmailMailbox(gmailClient(getAuthedClient(req)));
    } catch (err) {
      if (err instanceof PreconditionError) {
        log('precondition failed', { error: err.message });
        return redirectForPrecondition(req, res, err);
      }
      return next(err);
    }
    try {
      await handler(req, res, mailbox);
    } catch (err) {
      log('handler failed', { error: errorMessage(err) });
      next(err);
    }
  };
}

function bodyString(req: Request, key: string): string {
  const value: unknown = req.body?.[key];
  return typeof value === 'string' ? value : '';
}

function signedInAs(req: Request) {
  return readUser(req)?.email ?? null;
}

/**
 * Where `GET /` sends a visitor. Tokens alone are not enough: without an
 * OAuth client the inbox bounces straight back here.
 */
export function landingRedirect(opts: { signedIn: boolean; configured: boolean }): string | null {
  return opts.signedIn && opts.configured ? '/inbox' : null;
}

router.get('/', (req: Request, res: Response) => {
  const configured = hasClientConfig();
  const target = landingRedirect({ signedIn: Boolean(readTokens(req)), configured });
  if (target) {
    return res.redirect(target);
  }
  res.send(renderConnectPage({
    configured,
    reconnect: req.query.reconnect === '1',
    notices: takeNotices(req)
  }));
});

router.get('/inbox', withMailbox('inbox', async (req, res, mailbox) => {
  const state = readInboxState(req);
  const { records, notices } = await loadInbox(mailbox, state);
  res.send(renderInboxPage({
    state,
    records,
    notices: [...takeNotices(req), ...notices],
    signedInAs: signedInAs(req)
  }));
}));

router.post('/inbox/fetch', withMailbox('fetch', async (req, res, mailbox) => {
  const result = await fetchListing(mailbox, readInboxState(req), {
    query: bodyString(req, 'query'),
    maxResults: bodyString(req, 'maxResults')
  });
  writeInboxState(req, result.state);
  pushNotices(req, result.notices);
  res.redirect('/inbox');
}));

router.get('/messages/:id', withMailbox('message', async (req, res, mailbox) => {
  const { record, notices } = await loadMessage(mailbox, req.params.id);
  res.status(record ? 200 : 502).send(renderMessagePage({
    record,
    draft: '',
    notices: [...takeNotices(req), ...notices],
    signedInAs: signedInAs(req)
  }));
}));

router.post('/messages/:id/draft', withMailbox('draft', async (req, res, mailbox) => {
  const { record, draft, notices } = await prepareDraft(mailbox, generateReplyDraft, req.params.id);
  res.status(record ? 200 : 502).send(renderMessagePage({
    record,
    draft,
    notices,
    signedInAs: signedInAs(req)
  }));
}));

router.post('/messages/:id/reply', withMailbox('reply', async (req, res, mailbox) => {
  const id = req.params.id;
  const body = bodyString(req, 'body');
  const result = await sendReply(mailbox, id, body);
  if (result.sentId) {
    pushNotices(req, result.notices);
    return res.redirect('/inbox');
  }
  const { record, notices } = await loadMessage(mailbox, id);
  res.status(400).send(renderMessagePage({
    record,
    draft: body,
    notices: [...result.notices, ...notices],
    signedInAs: signedInAs(req)
  }));
}));

router.get('/compose', withMailbox('compose', async (req, res) => {
  res.send(renderComposePage({ form: clearCompose(), notices: takeNotices(req), signedInAs: signedInAs(req) }));
}));

router.post('/compose', withMailbox('compose', async (req, res, mailbox) => {
  const form: ComposeForm = {
    to: bodyString(req, 'to'),
    subject: bodyString(req, 'subject'),
    body: bodyString(req, 'body')
  };
  const result = await sendNewMessage(mailbox, form);
  res.status(result.sentId ? 200 : 400).send(renderComposePage({
    form: result.form,
    notices: result.notices,
    signedInAs: signedInAs(req)
  }));
}));
