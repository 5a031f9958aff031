import type { Request } from 'express';
import type { Credentials } from 'google-auth-library';
import { clampMaxResults } from '../gmail/client.js';
import { initialInboxState, type InboxState, type Notice, type NoticeLevel } from '../inbox/state.js';

export type SessionUser = {
  email: string;
};

// Everything below reads back from a client-held cookie, so each field is
// validated before it is trusted.

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown) {
  return typeof value === 'string' ? value : undefined;
}

export function parseTokens(value: unknown): Credentials | null {
  if (!isRecord(value)) return null;
  const accessToken = optionalString(value.access_token);
  const refreshToken = optionalString(value.refresh_token);
  if (!accessToken && !refreshToken) return null;
  const tokens: Credentials = {};
  if (accessToken) tokens.access_token = accessToken;
  if (refreshToken) tokens.refresh_token = refreshToken;
  if (typeof value.expiry_date === 'number') tokens.expiry_date = value.expiry_date;
  const scope = optionalString(value.scope);
  if (scope) tokens.scope = scope;
  const tokenType = optionalString(value.token_type);
  if (tokenType) tokens.token_type = tokenType;
  return tokens;
}

export function parseInboxState(value: unknown): InboxState {
  const fallback = initialInboxState();
  if (!isRecord(value)) return fallback;
  const ids = Array.isArray(value.messageIds)
    ? value.messageIds.filter((id): id is string => typeof id === 'string' && id.length > 0)
    : [];
  return {
    query: typeof value.query === 'string' ? value.query : fallback.query,
    maxResults: clampMaxResults(value.maxResults, fallback.maxResults),
    messageIds: ids,
    fetchedAt: typeof value.fetchedAt === 'number' ? value.fetchedAt : null
  };
}

const LEVELS: readonly NoticeLevel[] = ['success', 'info', 'warning', 'error'];

function isLevel(value: unknown): value is NoticeLevel {
  return LEVELS.some(level => level === value);
}

export function parseNotices(value: unknown): Notice[] {
  if (!Array.isArray(value)) return [];
  const notices: Notice[] = [];
  for (const item of value) {
    if (!isRecord(item) || !isLevel(item.level) || typeof item.text !== 'string') continue;
    notices.push({ level: item.level, text: item.text });
  }
  return notices;
}

export function parseUser(value: unknown): SessionUser | null {
  if (!isRecord(value) || typeof value.email !== 'string' || !value.email) return null;
  return { email: value.email };
}

export function readTokens(req: Request) {
  return parseTokens(req.session?.googleTokens);
}

export function writeTokens(req: Request, tokens: Credentials) {
  if (!req.session) return;
  req.session.googleTokens = tokens;
}

export function readUser(req: Request) {
  return parseUser(req.session?.user);
}

export function writeUser(req: Request, user: SessionUser) {
  if (!req.session) return;
  req.session.user = user;
}

export function readInboxState(req: Request) {
  return parseInboxState(req.session?.inbox);
}

export function writeInboxState(req: Request, state: InboxState) {
  if (!req.session) return;
  req.session.inbox = state;
}

export function pushNotices(req: Request, notices: Notice[]) {
  if (!req.session || !notices.length) return;
  req.session.notices = [...parseNotices(req.session.notices), ...notices];
}

/** Flash semantics: notices are shown once. */
export function takeNotices(req: Request): Notice[] {
  if (!req.session) return [];
  const notices = parseNotices(req.session.notices);
  if (notices.length) req.session.notices = [];
  return notices;
}

export function clearSession(req: Request) {
  req.session = null;
}
