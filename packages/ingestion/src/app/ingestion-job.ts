import type { CheckpointStore } from '../checkpoint/checkpoint-store';
import type { IngestionConfig } from '../config/env';
import { logger as rootLogger, type Logger } from '../core/logger';
import type {
  IngestionSummary,
  MessageSource,
  RawMessage,
  ResolvedTarget,
  TailResult,
} from '../domain/message.types';
import type { RecordSink } from '../sink/record-sink';
import { computeSince } from '../utils/lookback';
import { runCatchUp } from './catch-up-fetcher';
import { LiveTailController } from './live-tail-controller';

export interface IngestionDependencies {
  source: MessageSource;
  store: CheckpointStore;
  sink: RecordSink;
  logger?: Logger;
  now?: () => Date;
}

export type IngestionJobConfig = Pick<IngestionConfig, 'target' | 'lookbackHours' | 'follow' | 'resetCursor'>;

export class IngestionJob {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private cursor = 0;
  private tail: LiveTailController | null = null;

  constructor(
    private readonly deps: IngestionDependencies,
    private readonly config: IngestionJobConfig,
  ) {
    this.logger = deps.logger ?? rootLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /** Highest message id known to be written to the sink without gaps. */
  get currentCursor(): number {
    return this.tail ? Math.max(this.cursor, this.tail.safeCursor) : this.cursor;
  }

  async run(signal: AbortSignal): Promise<IngestionSummary> {
    const { source, store, sink } = this.deps;
    const mode = sink.kind === 'database' ? 'DATABASE' : 'STDOUT';

    const target = await source.resolve(this.config.target);
    this.logger.info('Scraping chat', { title: target.title, peerId: target.peerId, ref: target.ref });

    const since = computeSince(this.now(), this.config.lookbackHours);

    let startCursor: number;
    if (this.config.resetCursor) {
      this.logger.info('Cursor reset requested, starting from 0', { peerId: target.peerId });
      await store.reset(target.peerId);
      startCursor = 0;
    } else {
      startCursor = await store.load(target.peerId);
    }
    this.cursor = startCursor;

    this.logger.info(`[${mode}] Fetching since cursor or lookback`, {
      cursor: startCursor,
      since: since.toISOString(),
    });

    // In follow mode the subscription opens before catch-up and buffers what
    // arrives meanwhile; the tail drops whatever catch-up already delivered.
    const subscriptionControl = new AbortController();
    const forwardAbort = () => subscriptionControl.abort();
    signal.addEventListener('abort', forwardAbort, { once: true });
    const subscription = this.config.follow ? source.subscribeNewMessages(target, subscriptionControl.signal) : null;

    try {
      return await this.catchUpAndFollow(target, startCursor, since, subscription, signal);
    } finally {
      signal.removeEventListener('abort', forwardAbort);
      subscriptionControl.abort();
    }
  }

  private async catchUpAndFollow(
    target: ResolvedTarget,
    startCursor: number,
    since: Date,
    subscription: AsyncIterable<RawMessage> | null,
    signal: AbortSignal,
  ): Promise<IngestionSummary> {
    const { source, store, sink } = this.deps;
    const mode = sink.kind === 'database' ? 'DATABASE' : 'STDOUT';

    const catchUp = await runCatchUp({
      source,
      sink,
      target,
      lastId: startCursor,
      since,
      signal,
      logger: this.logger,
    });

    if (catchUp.maxId > startCursor) {
      await store.save(target.peerId, catchUp.maxId);
    }
    this.cursor = catchUp.maxId;

    this.logger.info(`[${mode}] Processed ${catchUp.count} messages`, {
      lastId: catchUp.maxId,
      skipped: catchUp.skipped,
      failed: catchUp.failed,
      aborted: catchUp.aborted,
    });

    let tail: TailResult | null = null;
    if (subscription && !signal.aborted) {
      this.tail = new LiveTailController({
        source,
        sink,
        store,
        target,
        lastId: catchUp.maxId,
        lastSeenId: catchUp.lastSeenId,
        pinned: catchUp.failed > 0,
        subscription,
        logger: this.logger,
      });
      tail = await this.tail.run(signal);
      this.logger.info('Live tail stopped', { ...tail });
    }

    return {
      target,
      startCursor,
      since,
      catchUp,
      tail,
      finalCursor: this.currentCursor,
    };
  }
}
