import { describe, it, expect, vi } from 'vitest';
import { AsyncMessageChannel } from '../src/core/message-channel';

async function drain<T>(channel: AsyncMessageChannel<T>, into: T[]) {
  for await (const item of channel) into.push(item);
}

describe('AsyncMessageChannel', () => {
  it('should deliver items pushed before and after the consumer waits', async () => {
    const channel = new AsyncMessageChannel<number>();
    const received: number[] = [];

    const consumer = drain(channel, received);
    channel.push(1);
    channel.push(2);
    channel.close();
    await consumer;

    expect(received).toEqual([1, 2]);
  });

  it('should drain buffered items after close', async () => {
    const channel = new AsyncMessageChannel<string>();
    channel.push('a');
    channel.push('b');
    channel.close();

    expect(channel.isClosed).toBe(true);
    expect(channel.size).toBe(2);

    const received: string[] = [];
    await drain(channel, received);
    expect(received).toEqual(['a', 'b']);
  });

  it('should refuse pushes once closed', () => {
    const channel = new AsyncMessageChannel<number>();
    channel.close();

    expect(channel.push(1)).toBe(false);
    expect(channel.size).toBe(0);
  });

  it('should reject the consumer after buffered items when closed with an error', async () => {
    const channel = new AsyncMessageChannel<number>();
    const received: number[] = [];

    const consumer = drain(channel, received);
    channel.push(1);
    channel.close(new Error('connection lost'));

    await expect(consumer).rejects.toThrow('connection lost');
    expect(received).toEqual([1]);
  });

  it('should close when the consumer stops early', async () => {
    const channel = new AsyncMessageChannel<number>();
    channel.push(1);
    channel.push(2);

    for await (const item of channel) {
      if (item === 1) break;
    }

    expect(channel.isClosed).toBe(true);
    expect(channel.push(3)).toBe(false);
  });

  it('should run the close hook once, whichever side closes', async () => {
    const onClose = vi.fn();
    const channel = new AsyncMessageChannel<number>(onClose);

    await channel[Symbol.asyncIterator]().return?.();
    channel.close();

    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
