import type { gmail_v1 } from 'googleapis';
import { ProviderError, type ProviderOperation } from '../util/errors.js';
import { rawFromGmail, type RawMessage } from './record.js';
import type { SendRequest } from './serialize.js';

export type ProviderResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ProviderError };

export type LabelDelta = {
  addLabelIds?: string[];
  removeLabelIds?: string[];
};

/**
 * Everything the assistant needs from the mail provider. Implementations
 * report failures as values; callers decide whether a failure is per-item
 * or fatal.
 */
export interface Mailbox {
  search(query: string, maxResults: number): Promise<ProviderResult<string[]>>;
  getMessage(id: string): Promise<ProviderResult<RawMessage>>;
  send(request: SendRequest): Promise<ProviderResult<string>>;
  modifyLabels(id: string, delta: LabelDelta): Promise<ProviderResult<void>>;
}

export function ok<T>(value: T): ProviderResult<T> {
  return { ok: true, value };
}

export function failed<T>(error: ProviderError): ProviderResult<T> {
  return { ok: false, error };
}

async function attempt<T>(operation: ProviderOperation, fn: () => Promise<T>): Promise<ProviderResult<T>> {
  try {
    return ok(await fn());
  } catch (err) {
    return failed(ProviderError.from(operation, err));
  }
}

export class GmailMailbox implements Mailbox {
  constructor(private readonly gmail: gmail_v1.Gmail, private readonly userId = 'me') {}

  search(query: string, maxResults: number) {
    return attempt('search', async () => {
      const res = await this.gmail.users.messages.list({
        userId: this.userId,
        q: query || undefined,
        maxResults
      });
      return (res.data.messages || [])
        .map(msg => msg?.id)
        .filter((id): id is string => Boolean(id));
    });
  }

  getMessage(id: string) {
    return attempt('get', async () => {
      const res = await this.gmail.users.messages.get({ userId: this.userId, id, format: 'full' });
      const raw = rawFromGmail(res.data);
      if (!raw) throw new ProviderError('get', `Gmail returned no message for ${id}`);
      return raw;
    });
  }

  send(request: SendRequest) {
    return attempt('send', async () => {
      const res = await this.gmail.users.messages.send({
        userId: this.userId,
        requestBody: request
      });
      if (!res.data.id) throw new ProviderError('send', 'Gmail accepted the message but returned no id');
      return res.data.id;
    });
  }

  modifyLabels(id: string, delta: LabelDelta) {
    return attempt('modify', async () => {
      await this.gmail.users.messages.modify({
        userId: this.userId,
        id,
        requestBody: {
          addLabelIds: delta.addLabelIds ?? [],
          removeLabelIds: delta.removeLabelIds ?? []
        }
      });
    });
  }
}
