import type { ComposeForm } from '../gmail/compose.js';
import { MAX_RESULTS_LIMIT } from '../gmail/client.js';
import { displayText } from '../gmail/normalize.js';
import { formatMailDate } from '../gmail/order.js';
import { isUnread, type EmailRecord } from '../gmail/record.js';
import type { InboxState, Notice } from '../inbox/state.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(s: string) {
  return String(s || '').replace(/[&<>"']/g, c => HTML_ESCAPES[c] ?? c);
}

const STYLES = `
body { font-family: system-ui, sans-serif; margin: 0; color: #1f2933; background: #f5f7fa; }
header { display: flex; gap: 1rem; align-items: center; padding: .75rem 1.5rem; background: #fff; border-bottom: 1px solid #d9e2ec; }
header nav a { margin-right: 1rem; }
header form { margin-left: auto; }
main { max-width: 960px; margin: 1.5rem auto; padding: 0 1rem; }
.notice { padding: .6rem .9rem; border-radius: 6px; margin-bottom: .5rem; }
.notice.success { background: #e3f9e5; } .notice.info { background: #e6f6ff; }
.notice.warning { background: #fffbea; } .notice.error { background: #ffe3e3; }
details { background: #fff; border: 1px solid #d9e2ec; border-radius: 6px; margin-bottom: .5rem; padding: .5rem .9rem; }
details.unread summary { font-weight: 600; }
pre { white-space: pre-wrap; background: #f0f4f8; padding: .75rem; border-radius: 4px; }
iframe { width: 100%; height: 400px; border: 1px solid #d9e2ec; background: #fff; }
textarea, input[type=text], input[type=email] { width: 100%; box-sizing: border-box; }
.tabs > input { display: none; }
.tabs > label { display: inline-block; padding: .3rem .7rem; cursor: pointer; border-bottom: 2px solid transparent; }
.tabs > input:checked + label { border-bottom-color: #2680c2; }
.tabs > section { display: none; padding-top: .5rem; }
${[0, 1, 2, 3].map(i => `.tabs > input:nth-of-type(${i + 1}):checked ~ section:nth-of-type(${i + 1})`).join(',\n')} { display: block; }
`;

function layout(title: string, content: string, opts: { notices?: Notice[]; signedInAs?: string | null } = {}) {
  const notices = (opts.notices || [])
    .map(n => `<div class="notice ${n.level}">${escapeHtml(n.text)}</div>`)
    .join('\n');
  const nav = opts.signedInAs
    ? `<nav><a href="/inbox">📥 Search Emails</a><a href="/compose">✉️ Compose New Email</a></nav>
<span>${escapeHtml(opts.signedInAs)}</span>
<form method="post" action="/auth/logout"><button type="submit">Reset token (log out)</button></form>`
    : '';
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<style>${STYLES}</style>
</head>
<body>
<header><strong>📨 Gmail Reply Assistant</strong>${nav}</header>
<main>
${notices}
${content}
</main>
</body>
</html>`;
}

export function renderConnectPage(opts: { configured: boolean; reconnect: boolean; notices: Notice[] }) {
  const setup = opts.configured
    ? `<p><a href="/auth/google">Connect Gmail</a></p>`
    : `<p>No Google OAuth client is configured. Set <code>GOOGLE_CLIENT_ID</code>, <code>GOOGLE_CLIENT_SECRET</code>
and <code>GOOGLE_REDIRECT_URI</code> in <code>.env</code>, or place your downloaded <code>credentials.json</code>
next to the server, then reload this page.</p>`;
  const reconnect = opts.reconnect
    ? `<p class="notice warning">Google permissions changed. Please reconnect your Google account.</p>`
    : '';
  return layout('Connect Gmail', `<h1>Setup</h1>
<p>Browse your Gmail or compose new emails with the help of AI drafts.</p>
${reconnect}
${setup}`, { notices: opts.notices });
}

function renderSearchForm(state: InboxState) {
  return `<form method="post" action="/inbox/fetch">
<label>Search query (e.g., is:unread newer_than:7d)
<input type="text" name="query" value="${escapeHtml(state.query)}"></label>
<label>Max results
<input type="number" name="maxResults" min="1" max="${MAX_RESULTS_LIMIT}" value="${state.maxResults}"></label>
<button type="submit">📥 Fetch messages</button>
</form>`;
}

function renderReplyForm(record: EmailRecord, draft: string) {
  const id = encodeURIComponent(record.id);
  return `<form method="post" action="/messages/${id}/draft"><button type="submit">🤖 Generate AI draft</button></form>
<form method="post" action="/messages/${id}/reply">
<label>Reply draft<textarea name="body" rows="8">${escapeHtml(draft)}</textarea></label>
<button type="submit">📤 Send reply</button>
</form>`;
}

function renderMessageBody(record: EmailRecord, opts: { draft: string; open: boolean }) {
  const group = `msg-${escapeHtml(record.id)}`;
  const replyTab = opts.open ? 3 : 0;
  const tabs = ['📝 Snippet', '📃 Text body', '🌐 HTML preview', '🤖 Reply']
    .map((label, i) => `<input type="radio" name="${group}" id="${group}-${i}"${i === replyTab ? ' checked' : ''}><label for="${group}-${i}">${label}</label>`)
    .join('');
  const html = record.htmlText.trim()
    ? `<iframe sandbox="" srcdoc="${escapeHtml(record.htmlText)}"></iframe>`
    : `<p>No HTML content.</p>`;
  return `<p><strong>From:</strong> ${escapeHtml(record.from || '')}<br>
<strong>To:</strong> ${escapeHtml(record.to || '')}<br>
<strong>Date:</strong> ${escapeHtml(record.date || '')}</p>
<div class="tabs">${tabs}
<section><pre>${escapeHtml(record.snippet)}</pre></section>
<section><pre>${escapeHtml(displayText(record) || '(no text content)')}</pre></section>
<section>${html}</section>
<section>${renderReplyForm(record, opts.draft)}</section>
</div>`;
}

function summaryLine(record: EmailRecord) {
  return `📩 ${escapeHtml(record.subject || '(no subject)')} — ${escapeHtml(record.from || '')} [${escapeHtml(formatMailDate(record.date))}]`;
}

export function renderInboxPage(opts: {
  state: InboxState;
  records: EmailRecord[];
  notices: Notice[];
  signedInAs: string | null;
}) {
  const list = opts.records.length
    ? opts.records
      .map(record => `<details class="${isUnread(record) ? 'unread' : ''}">
<summary>${summaryLine(record)}</summary>
${renderMessageBody(record, { draft: '', open: false })}
</details>`)
      .join('\n')
    : opts.state.fetchedAt
      ? `<p>No messages matched.</p>`
      : `<p class="notice info">Click <strong>Fetch messages</strong> to list your Gmail messages.</p>`;
  return layout('Search Gmail', `<h1>Search Gmail</h1>
${renderSearchForm(opts.state)}
${list}`, { notices: opts.notices, signedInAs: opts.signedInAs });
}

export function renderMessagePage(opts: {
  record: EmailRecord | null;
  draft: string;
  notices: Notice[];
  signedInAs: string | null;
}) {
  if (!opts.record) {
    return layout('Message unavailable', `<p><a href="/inbox">Back to inbox</a></p>`, {
      notices: opts.notices,
      signedInAs: opts.signedInAs
    });
  }
  return layout(opts.record.subject || '(no subject)', `<p><a href="/inbox">Back to inbox</a></p>
<h2>${summaryLine(opts.record)}</h2>
${renderMessageBody(opts.record, { draft: opts.draft, open: true })}`, {
    notices: opts.notices,
    signedInAs: opts.signedInAs
  });
}

export function renderComposePage(opts: { form: ComposeForm; notices: Notice[]; signedInAs: string | null }) {
  const { form } = opts;
  return layout('Compose New Email', `<h1>Compose New Email</h1>
<form method="post" action="/compose">
<label>To<input type="text" name="to" value="${escapeHtml(form.to)}"></label>
<label>Subject<input type="text" name="subject" value="${escapeHtml(form.subject)}"></label>
<label>Body<textarea name="body" rows="14">${escapeHtml(form.body)}</textarea></label>
<button type="submit">📤 Send Email</button>
<a href="/compose">❌ Clear</a>
</form>`, { notices: opts.notices, signedInAs: opts.signedInAs });
}
