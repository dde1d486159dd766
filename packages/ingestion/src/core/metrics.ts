export class Metrics {
  private metrics: Map<string, number> = new Map();
  private startTime: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  increment(metric: string, value: number = 1) {
    const current = this.metrics.get(metric) || 0;
    this.metrics.set(metric, current + value);
  }

  timing(metric: string, durationMs: number) {
    const sumKey = `${metric}_sum`;
    const countKey = `${metric}_count`;
    this.increment(sumKey, durationMs);
    this.increment(countKey, 1);
  }

  get(metric: string): number {
    return this.metrics.get(metric) || 0;
  }

  getSnapshot(): Record<string, number> {
    const elapsed = (this.now() - this.startTime) / 1000;
    const totalMessages = this.get('messages_sunk');
    const avgMessagesPerSec = elapsed > 0 ? totalMessages / elapsed : 0;

    return {
      ...Object.fromEntries(this.metrics),
      uptime_sec: elapsed,
      messages_per_sec: avgMessagesPerSec,
    };
  }
}

export const metrics = new Metrics();
