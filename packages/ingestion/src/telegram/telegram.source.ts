import type { TelegramClient } from 'telegram';
import { NewMessage, type NewMessageEvent } from 'telegram/events';
import { returnBigInt } from 'telegram/Helpers';
import { getPeerId } from 'telegram/Utils';
import { logger as rootLogger, type Logger } from '../core/logger';
import { AsyncMessageChannel } from '../core/message-channel';
import { metrics } from '../core/metrics';
import type { MessageSource, RawMessage, ResolvedTarget, TargetRef } from '../domain/message.types';

function isRawMessage(value: unknown): value is RawMessage {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'id') === 'number';
}

function toEntityLike(ref: TargetRef) {
  return typeof ref === 'number' ? returnBigInt(ref) : ref;
}

function entityTitle(entity: object, fallback: TargetRef): string {
  for (const key of ['title', 'username', 'firstName']) {
    const value = Reflect.get(entity, key);
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return String(fallback);
}

export class TelegramMessageSource implements MessageSource {
  private readonly logger: Logger;

  constructor(
    private readonly client: TelegramClient,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child('source');
  }

  async resolve(ref: TargetRef): Promise<ResolvedTarget> {
    let entity;
    try {
      entity = await this.client.getEntity(toEntityLike(ref));
    } catch (error) {
      if (typeof ref !== 'number') throw error;
      // Bare numeric ids resolve only once the peer is in the session's entity cache.
      this.logger.info('Peer not cached, loading dialogs before retrying', { ref });
      await this.client.getDialogs({});
      entity = await this.client.getEntity(toEntityLike(ref));
    }

    const peerId = Number(getPeerId(entity));
    if (!Number.isSafeInteger(peerId)) {
      throw new Error(`Unable to derive a numeric peer id for ${String(ref)}`);
    }
    return { ref, peerId, title: entityTitle(entity, ref) };
  }

  async *fetchMessagesSince(target: ResolvedTarget, minId: number, since: Date): AsyncIterable<RawMessage> {
    const start = Date.now();
    const messages = this.client.iterMessages(returnBigInt(target.peerId), {
      minId,
      offsetDate: Math.floor(since.getTime() / 1000),
      reverse: true,
    });

    try {
      for await (const message of messages) {
        if (isRawMessage(message)) yield message;
      }
    } catch (error) {
      metrics.increment('fetch_errors');
      throw error;
    } finally {
      metrics.timing('catch_up_fetch_ms', Date.now() - start);
    }
  }

  subscribeNewMessages(target: ResolvedTarget, signal: AbortSignal): AsyncIterable<RawMessage> {
    if (signal.aborted) {
      const closed = new AsyncMessageChannel<RawMessage>();
      closed.close();
      return closed;
    }

    const event = new NewMessage({ chats: [returnBigInt(target.peerId)] });
    const onAbort = (): void => channel.close();
    // Runs on abort and when the consumer stops iterating early.
    const channel: AsyncMessageChannel<RawMessage> = new AsyncMessageChannel(() => {
      this.client.removeEventHandler(handler, event);
      signal.removeEventListener('abort', onAbort);
      this.logger.debug('New message subscription closed', { peerId: target.peerId });
    });

    const handler = (update: NewMessageEvent): void => {
      if (isRawMessage(update.message)) channel.push(update.message);
    };

    this.client.addEventHandler(handler, event);
    signal.addEventListener('abort', onAbort, { once: true });
    this.logger.debug('Subscribed to new messages', { peerId: target.peerId });
    return channel;
  }

  async close(): Promise<void> {
    await this.client.destroy();
  }
}
