import type { CheckpointStore } from '../checkpoint/checkpoint-store';
import { IngestionStateError } from '../core/errors';
import { logger as rootLogger, type Logger } from '../core/logger';
import { metrics } from '../core/metrics';
import type { MessageSource, RawMessage, ResolvedTarget, TailResult, TailState } from '../domain/message.types';
import { toRecord } from '../models/message-record';
import type { RecordSink } from '../sink/record-sink';

export interface LiveTailOptions {
  source: MessageSource;
  sink: RecordSink;
  store: CheckpointStore;
  target: ResolvedTarget;
  /** Cursor left by catch-up. */
  lastId: number;
  /** Highest id catch-up took from the source; defaults to `lastId`. */
  lastSeenId?: number;
  /** Start with checkpointing suspended, e.g. after a catch-up sink failure. */
  pinned?: boolean;
  /**
   * Subscription opened before catch-up so nothing posted in between is missed.
   * Without one the tail subscribes when it starts.
   */
  subscription?: AsyncIterable<RawMessage>;
  logger?: Logger;
}

/**
 * Follows new messages after catch-up: INACTIVE → ACTIVE → STOPPED.
 *
 * Each accepted message is written to the sink and then checkpointed before
 * the next one is taken, so cancellation between messages never leaves a
 * delivered-but-unsaved id behind except after a failed save, which the final
 * save retries.
 */
export class LiveTailController {
  private currentState: TailState = 'INACTIVE';
  private seenId: number;
  private writtenId: number;
  private savedId: number;
  private processedCount = 0;
  private duplicateCount = 0;
  private failedCount = 0;
  // Set after a sink failure: the cursor must stay below the undelivered id.
  private pinned: boolean;
  private readonly logger: Logger;

  constructor(private readonly options: LiveTailOptions) {
    this.seenId = Math.max(options.lastId, options.lastSeenId ?? options.lastId);
    this.writtenId = options.lastId;
    this.savedId = options.lastId;
    this.pinned = options.pinned ?? false;
    this.logger = (options.logger ?? rootLogger).child('tail');
  }

  get state(): TailState {
    return this.currentState;
  }

  /** Highest message id taken from the subscription. */
  get lastSeenId(): number {
    return this.seenId;
  }

  /** Highest id the checkpoint store acknowledged. */
  get lastSavedId(): number {
    return this.savedId;
  }

  /** Highest id that is safe to checkpoint: written, with nothing undelivered below it. */
  get safeCursor(): number {
    return this.writtenId;
  }

  get processed(): number {
    return this.processedCount;
  }

  async run(signal: AbortSignal): Promise<TailResult> {
    if (this.currentState !== 'INACTIVE') {
      throw new IngestionStateError(`Live tail cannot start from state ${this.currentState}`);
    }
    this.currentState = 'ACTIVE';

    const { source, target, subscription } = this.options;
    this.logger.info('Listening for new messages', { peerId: target.peerId, lastId: this.seenId });

    try {
      for await (const raw of subscription ?? source.subscribeNewMessages(target, signal)) {
        await this.handle(raw);
      }
    } finally {
      this.currentState = 'STOPPED';
      await this.flush();
    }

    return this.result();
  }

  private async handle(raw: RawMessage) {
    const { sink, store, target } = this.options;
    const { id } = raw;

    if (id <= this.seenId) {
      this.duplicateCount += 1;
      metrics.increment('tail_duplicates');
      this.logger.debug('Discarding already processed message', { messageId: id, lastSeenId: this.seenId });
      return;
    }

    const record = toRecord(target.peerId, raw);
    const written = await sink.write(target.peerId, record);
    this.seenId = id;

    if (!written) {
      this.failedCount += 1;
      if (!this.pinned) {
        this.pinned = true;
        this.logger.warn('Sink write failed; checkpoint stays pinned for the rest of this run', {
          messageId: id,
          cursor: this.savedId,
        });
      }
      return;
    }

    this.processedCount += 1;
    metrics.increment('messages_sunk');
    if (this.pinned) return;

    this.writtenId = id;
    if (await store.save(target.peerId, id)) {
      this.savedId = id;
    }
  }

  private async flush() {
    const cursor = this.safeCursor;
    if (cursor <= this.savedId) return;

    this.logger.info('Saving final state', { cursor });
    if (await this.options.store.save(this.options.target.peerId, cursor)) {
      this.savedId = cursor;
    }
  }

  private result(): TailResult {
    return {
      processed: this.processedCount,
      duplicates: this.duplicateCount,
      failed: this.failedCount,
      lastSeenId: this.seenId,
      lastSavedId: this.savedId,
    };
  }
}
