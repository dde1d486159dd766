import { describe, it, expect, beforeEach } from 'vitest';
import { LiveTailController, type LiveTailOptions } from '../src/app/live-tail-controller';
import { IngestionStateError } from '../src/core/errors';
import type { ResolvedTarget, TailState } from '../src/domain/message.types';
import { FakeMessageSource, MemorySink, MemoryStore, PEER_ID, message, silentLogger } from './helpers/fakes';

const target: ResolvedTarget = { ref: 'test-chat', peerId: PEER_ID, title: 'Test chat' };

describe('LiveTailController', () => {
  let source: FakeMessageSource;
  let sink: MemorySink;
  let store: MemoryStore;

  beforeEach(() => {
    source = new FakeMessageSource();
    sink = new MemorySink();
    store = new MemoryStore();
  });

  const createTail = (options: Partial<LiveTailOptions> = {}) =>
    new LiveTailController({ source, sink, store, target, lastId: 9, logger: silentLogger(), ...options });

  it('should discard messages catch-up already delivered', async () => {
    source.live = [message(9), message(10)];
    const tail = createTail({ lastSeenId: 9 });

    const result = await tail.run(new AbortController().signal);

    expect(result).toEqual({ processed: 1, duplicates: 1, failed: 0, lastSeenId: 10, lastSavedId: 10 });
    expect(sink.writes).toEqual([10]);
    expect(store.saves).toEqual([10]);
  });

  it('should checkpoint each message right after writing it', async () => {
    const journal: string[] = [];
    sink.journal = journal;
    store.journal = journal;
    source.live = [10, 11, 12].map((id) => message(id));

    await createTail().run(new AbortController().signal);

    expect(journal).toEqual(['write:10', 'save:10', 'write:11', 'save:11', 'write:12', 'save:12']);
  });

  it('should retry a failed save once the tail stops', async () => {
    source.live = [message(10), message(11)];
    store.failOnce.add(11);
    const tail = createTail();

    const result = await tail.run(new AbortController().signal);

    expect(store.saves).toEqual([10, 11, 11]);
    expect(result.lastSavedId).toBe(11);
    expect(store.values.get(PEER_ID)).toBe(11);
  });

  it('should pin the checkpoint after a sink failure', async () => {
    source.live = [10, 11, 12].map((id) => message(id));
    sink.failing.add(11);

    const result = await createTail().run(new AbortController().signal);

    expect(result).toEqual({ processed: 2, duplicates: 0, failed: 1, lastSeenId: 12, lastSavedId: 10 });
    expect(store.saves).toEqual([10]);
    expect([...sink.records.keys()]).toEqual([10, 12]);
  });

  it('should start pinned when catch-up left an undelivered message', async () => {
    source.live = [message(10)];
    const tail = createTail({ lastSeenId: 9, lastId: 5, pinned: true });

    const result = await tail.run(new AbortController().signal);

    expect(result.processed).toBe(1);
    expect(store.saves).toEqual([]);
    expect(tail.safeCursor).toBe(5);
  });

  it('should move through its states once', async () => {
    source.live = [message(10)];
    const tail = createTail();
    const observed: TailState[] = [tail.state];
    sink.onWrite = () => observed.push(tail.state);

    await tail.run(new AbortController().signal);
    observed.push(tail.state);

    expect(observed).toEqual(['INACTIVE', 'ACTIVE', 'STOPPED']);
    await expect(tail.run(new AbortController().signal)).rejects.toBeInstanceOf(IngestionStateError);
  });

  it('should stop when the signal aborts', async () => {
    const controller = new AbortController();
    source.live = [message(10), message(11)];
    source.endLive = false;
    sink.onWrite = (record) => {
      if (record.id === 11) controller.abort();
    };
    const tail = createTail();

    const result = await tail.run(controller.signal);

    expect(result).toEqual({ processed: 2, duplicates: 0, failed: 0, lastSeenId: 11, lastSavedId: 11 });
    expect(tail.state).toBe('STOPPED');
  });

  it('should save before propagating a subscription error', async () => {
    source.live = [message(10)];
    source.liveError = new Error('connection lost');
    store.failOnce.add(10);
    const tail = createTail();

    await expect(tail.run(new AbortController().signal)).rejects.toThrow('connection lost');

    expect(store.saves).toEqual([10, 10]);
    expect(tail.lastSavedId).toBe(10);
    expect(tail.state).toBe('STOPPED');
  });
});
