import pLimit from 'p-limit';
import type { ProviderError } from '../util/errors.js';
import { performance } from 'node:perf_hooks';
import { elapsedMs, scopedLogger, warnLogger } from '../util/log.js';
import type { Mailbox } from './mailbox.js';
import { orderByDate } from './order.js';
import { toEmailRecord, type EmailRecord } from './record.js';

// 1 keeps detail fetches strictly sequential.
export function parseConcurrency(value: string | undefined): number {
  const parsed = Math.trunc(Number(value ?? 1));
  return Number.isFinite(parsed) && parsed >= 1 ? parsed : 1;
}

const DETAIL_FETCH_CONCURRENCY = parseConcurrency(process.env.DETAIL_FETCH_CONCURRENCY);

export type FetchFailure = {
  id: string;
  error: ProviderError;
};

export type BatchResult = {
  records: EmailRecord[];
  failures: FetchFailure[];
};

type Outcome =
  | { ok: true; record: EmailRecord }
  | { ok: false; failure: FetchFailure };

const log = scopedLogger('fetch');
const warn = warnLogger('fetch');

/**
 * Loads every id, newest first. A failed id is reported in `failures`
 * and the rest of the batch still loads.
 */
export async function fetchRecords(
  mailbox: Mailbox,
  ids: readonly string[],
  opts: { concurrency?: number } = {}
): Promise<BatchResult> {
  const start = performance.now();
  const limit = pLimit(opts.concurrency ?? DETAIL_FETCH_CONCURRENCY);

  const outcomes = await Promise.all(
    ids.map(id =>
      limit(async (): Promise<Outcome> => {
        const result = await mailbox.getMessage(id);
        if (!result.ok) {
          warn('failed to load message', { id, status: result.error.status, error: result.error.message });
          return { ok: false, failure: { id, error: result.error } };
        }
        return { ok: true, record: toEmailRecord(result.value) };
      })
    )
  );

  const records: EmailRecord[] = [];
  const failures: FetchFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) records.push(outcome.record);
    else failures.push(outcome.failure);
  }
  if (ids.length) {
    log('batch loaded', { requested: ids.length, loaded: records.length, failed: failures.length, ms: elapsedMs(start) });
  }
  return { records: orderByDate(records), failures };
}
