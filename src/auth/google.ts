import { Router, type Request, type Response } from 'express';
import { OAuth2Client, type Credentials } from 'google-auth-library';
import { gmailClient } from '../gmail/client.js';
import { MissingCredentialsError, MissingScopeError, PreconditionError, errorMessage } from '../util/errors.js';
import { scopedLogger } from '../util/log.js';
import { resolveClientConfig } from './credentials.js';
import { clearSession, pushNotices, readTokens, writeTokens, writeUser } from './session.js';

export const authRouter = Router();

const log = scopedLogger('auth');

function createOAuthClient() {
  const config = resolveClientConfig();
  return new OAuth2Client(config.clientId, config.clientSecret, config.redirectUri);
}

export const GMAIL_SCOPES = [
  'https://www.googleapis.com/auth/gmail.modify',
  'https://www.googleapis.com/auth/gmail.send'
] as const;

function parseScopes(raw: string | undefined | null): string[] {
  if (!raw) return [];
  return raw
    .split(/[,\s]+/)
    .map(s => s.trim())
    .filter(Boolean);
}

const ENV_SCOPES = parseScopes(process.env.GOOGLE_SCOPES);
const REQUESTED_SCOPES = Array.from(new Set<string>([...GMAIL_SCOPES, ...ENV_SCOPES]));

function parseGrantedScopes(raw: unknown): string[] {
  if (Array.isArray(raw)) return raw.filter(Boolean).map(String);
  if (typeof raw === 'string') {
    return raw.split(/\s+/).map(s => s.trim()).filter(Boolean);
  }
  return [];
}

export function getMissingGmailScopes(tokens: { scope?: string | string[] } | null | undefined): string[] {
  const grantedScopes = parseGrantedScopes(tokens?.scope);
  if (!grantedScopes.length) return [...REQUESTED_SCOPES];
  const scopeSet = new Set(grantedScopes);
  return REQUESTED_SCOPES.filter(scope => !scopeSet.has(scope));
}

authRouter.get('/google', (_req: Request, res: Response) => {
  let client: OAuth2Client;
  try {
    client = createOAuthClient();
  } catch (err) {
    if (!(err instanceof MissingCredentialsError)) throw err;
    return res.status(503).type('text/plain').send(err.message);
  }
  const url = client.generateAuthUrl({
    access_type: 'offline',
    scope: REQUESTED_SCOPES,
    prompt: 'consent'
  });
  res.redirect(url);
});

authRouter.get('/google/callback', async (req: Request, res: Response) => {
  const code = typeof req.query.code === 'string' ? req.query.code : '';
  if (!code) return res.status(400).send('Missing authorization code.');

  try {
    const oauthClient = createOAuthClient();
    const { tokens } = await oauthClient.getToken(code);
    oauthClient.setCredentials(tokens);

    const missingScopes = getMissingGmailScopes(tokens);
    if (missingScopes.length) {
      console.error('User did not grant the required Gmail scopes', {
        missingScopes,
        grantedScopes: tokens.scope
      });
      return res
        .status(403)
        .send('Google did not grant Gmail access. Please remove the app from your Google Account permissions and try again.');
    }

    const gmail = gmailClient(oauthClient);
    const { data: gmailProfile } = await gmail.users.getProfile({ userId: 'me' });
    const email = gmailProfile.emailAddress;
    if (!email) {
      return res.status(400).send('Unable to retrieve Gmail profile information.');
    }

    writeTokens(req, tokens);
    writeUser(req, { email });
    log('connected account', { email });
    res.redirect('/inbox');
  } catch (err) {
    console.error('OAuth callback failed', err);
    res.status(500).type('text/plain').send(`Unable to finish Google sign-in: ${errorMessage(err)}`);
  }
});

authRouter.post('/logout', (req: Request, res: Response) => {
  clearSession(req);
  res.redirect('/');
});

/**
 * OAuth client for the signed-in user. Throws a PreconditionError subclass
 * when no usable credential is on the session, before any Gmail call.
 * Refreshed tokens are merged back into the session.
 */
export function getAuthedClient(req: Request): OAuth2Client {
  const tokens = readTokens(req);
  if (!tokens) {
    throw new MissingCredentialsError();
  }
  const missingScopes = getMissingGmailScopes(tokens);
  if (missingScopes.length) {
    throw new MissingScopeError(missingScopes);
  }
  const client = createOAuthClient();
  client.setCredentials(tokens);
  client.on('tokens', (fresh: Credentials) => {
    const current: Credentials = readTokens(req) ?? {};
    writeTokens(req, {
      ...current,
      ...fresh,
      refresh_token: fresh.refresh_token || current.refresh_token
    });
  });
  return client;
}

export function redirectForPrecondition(req: Request, res: Response, err: PreconditionError) {
  if (err instanceof MissingScopeError) {
    clearSession(req);
    return res.redirect('/?reconnect=1');
  }
  pushNotices(req, [{ level: 'error', text: err.message }]);
  return res.redirect('/');
}
