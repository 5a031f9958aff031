import fs from 'node:fs';
import path from 'node:path';
import { MissingCredentialsError } from '../util/errors.js';

export type OAuthClientConfig = {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
};

const DEFAULT_CREDENTIALS_FILE = 'credentials.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts the client-secrets JSON Google Cloud Console downloads, in either
 * its `web` or `installed` shape. `redirectUri` wins over the file's first
 * redirect URI when given.
 */
export function parseClientSecrets(json: unknown, redirectUri?: string): OAuthClientConfig | null {
  if (!isRecord(json)) return null;
  const section = isRecord(json.web) ? json.web : isRecord(json.installed) ? json.installed : null;
  if (!section) return null;
  const clientId = typeof section.client_id === 'string' ? section.client_id : '';
  const clientSecret = typeof section.client_secret === 'string' ? section.client_secret : '';
  const redirects = Array.isArray(section.redirect_uris)
    ? section.redirect_uris.filter((uri): uri is string => typeof uri === 'string' && uri.length > 0)
    : [];
  const redirect = redirectUri || redirects[0] || '';
  if (!clientId || !clientSecret || !redirect) return null;
  return { clientId, clientSecret, redirectUri: redirect };
}

export function credentialsFilePath(env: NodeJS.ProcessEnv = process.env) {
  return path.resolve(process.cwd(), env.GOOGLE_CREDENTIALS_FILE?.trim() || DEFAULT_CREDENTIALS_FILE);
}

/**
 * GOOGLE_CLIENT_ID / GOOGLE_CLIENT_SECRET / GOOGLE_REDIRECT_URI first, then the
 * client-secrets file. Throws MissingCredentialsError when neither is usable.
 */
export function resolveClientConfig(env: NodeJS.ProcessEnv = process.env): OAuthClientConfig {
  const clientId = env.GOOGLE_CLIENT_ID?.trim();
  const clientSecret = env.GOOGLE_CLIENT_SECRET?.trim();
  const redirectUri = env.GOOGLE_REDIRECT_URI?.trim();
  if (clientId && clientSecret && redirectUri) {
    return { clientId, clientSecret, redirectUri };
  }

  const file = credentialsFilePath(env);
  if (!fs.existsSync(file)) {
    throw new MissingCredentialsError(
      `Missing Google OAuth client. Set GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REDIRECT_URI, or add ${path.basename(file)}.`
    );
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new MissingCredentialsError(`Unable to read ${path.basename(file)}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const config = parseClientSecrets(parsed, redirectUri);
  if (!config) {
    throw new MissingCredentialsError(`${path.basename(file)} is not a Google OAuth client-secrets file.`);
  }
  return config;
}

export function hasClientConfig(env: NodeJS.ProcessEnv = process.env) {
  try {
    resolveClientConfig(env);
    return true;
  } catch (err) {
    if (err instanceof MissingCredentialsError) return false;
    throw err;
  }
}
