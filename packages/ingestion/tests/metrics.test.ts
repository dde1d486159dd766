import { describe, it, expect, beforeEach } from 'vitest';
import { Metrics } from '../src/core/metrics';

describe('Metrics', () => {
  let now: number;
  let metrics: Metrics;

  beforeEach(() => {
    now = 1_000;
    metrics = new Metrics(() => now);
  });

  it('should increment counters', () => {
    metrics.increment('checkpoint_saves', 1);
    metrics.increment('checkpoint_saves', 2);
    const snapshot = metrics.getSnapshot();
    expect(snapshot.checkpoint_saves).toBe(3);
  });

  it('should track timing', () => {
    metrics.timing('sink_write_ms', 100);
    metrics.timing('sink_write_ms', 50);
    const snapshot = metrics.getSnapshot();
    expect(snapshot.sink_write_ms_sum).toBe(150);
    expect(snapshot.sink_write_ms_count).toBe(2);
  });

  it('should derive throughput from sunk messages', () => {
    metrics.increment('messages_sunk', 10);
    now = 3_000;
    const snapshot = metrics.getSnapshot();
    expect(snapshot.uptime_sec).toBe(2);
    expect(snapshot.messages_per_sec).toBe(5);
  });

  it('should report zero for unknown counters', () => {
    expect(metrics.get('fetch_errors')).toBe(0);
    expect(metrics.getSnapshot().messages_per_sec).toBe(0);
  });
});
