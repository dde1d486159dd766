import type { MessageRecord } from '../models/message-record';

export type SinkBackend = 'stdout' | 'database';

/**
 * Destination for normalized records. Writes must be idempotent per
 * (peer, message id): the same record may be delivered more than once.
 * Failures are reported as `false`, never thrown.
 */
export interface RecordSink {
  readonly kind: SinkBackend;
  write(peerId: number, record: MessageRecord): Promise<boolean>;
}
