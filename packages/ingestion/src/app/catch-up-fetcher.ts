import { logger as rootLogger, type Logger } from '../core/logger';
import { metrics } from '../core/metrics';
import type { CatchUpResult, MessageSource, ResolvedTarget } from '../domain/message.types';
import { toRecord } from '../models/message-record';
import type { RecordSink } from '../sink/record-sink';

export interface CatchUpOptions {
  source: MessageSource;
  sink: RecordSink;
  target: ResolvedTarget;
  /** Cursor the pass starts from; only ids above it are delivered. */
  lastId: number;
  /** Lookback floor; messages known to be older are skipped. */
  since: Date;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Streams the backlog above `lastId` into the sink in ascending id order.
 *
 * Both bounds apply: a message must have an id above the cursor and must not
 * predate `since`. The returned `maxId` is the highest id up to which every
 * accepted message was written, so it can be checkpointed as-is; after a sink
 * failure it stops advancing and the next run re-fetches from there.
 */
export async function runCatchUp(options: CatchUpOptions): Promise<CatchUpResult> {
  const { source, sink, target, lastId, since, signal } = options;
  const logger = (options.logger ?? rootLogger).child('catch-up');
  const sinceMs = since.getTime();

  const result: CatchUpResult = { maxId: lastId, lastSeenId: lastId, count: 0, skipped: 0, failed: 0, aborted: false };

  try {
    for await (const raw of source.fetchMessagesSince(target, lastId, since)) {
      if (signal?.aborted) {
        result.aborted = true;
        logger.info('Catch-up interrupted', { maxId: result.maxId, count: result.count });
        break;
      }

      if (raw.id <= result.lastSeenId) {
        result.skipped += 1;
        metrics.increment('messages_skipped');
        logger.debug('Skipping message at or below cursor', { messageId: raw.id, lastSeenId: result.lastSeenId });
        continue;
      }
      result.lastSeenId = raw.id;

      const record = toRecord(target.peerId, raw);
      if (record.date !== null && Date.parse(record.date) < sinceMs) {
        result.skipped += 1;
        metrics.increment('messages_skipped');
        logger.debug('Skipping message older than lookback window', { messageId: raw.id, date: record.date });
        continue;
      }

      if (await sink.write(target.peerId, record)) {
        result.count += 1;
        metrics.increment('messages_sunk');
        if (result.failed === 0) {
          result.maxId = Math.max(result.maxId, record.id);
        }
      } else {
        result.failed += 1;
        if (result.failed === 1) {
          logger.warn('Sink write failed; cursor will not advance past this message', { messageId: record.id });
        }
      }
    }
  } catch (error) {
    result.aborted = true;
    logger.error('Fetch stream failed, keeping partial progress', {
      error,
      maxId: result.maxId,
      count: result.count,
    });
  }

  return result;
}
