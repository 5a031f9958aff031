import { google } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';

export function gmailClient(auth: OAuth2Client) {
  return google.gmail({ version: 'v1', auth });
}

/**
 * Query prefilled in the search form. Gmail search operators apply,
 * e.g. "is:unread newer_than:7d". Override via GMAIL_QUERY in .env.
 */
export const DEFAULT_QUERY = process.env.GMAIL_QUERY?.trim() || '';

export const MAX_RESULTS_LIMIT = 50;
const FALLBACK_MAX_RESULTS = 10;

export function clampMaxResults(value: unknown, fallback = FALLBACK_MAX_RESULTS): number {
  const parsed = typeof value === 'number' ? value : Number.parseInt(String(value ?? ''), 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(Math.max(Math.trunc(parsed), 1), MAX_RESULTS_LIMIT);
}

export const DEFAULT_MAX_RESULTS = clampMaxResults(process.env.GMAIL_MAX_RESULTS);
