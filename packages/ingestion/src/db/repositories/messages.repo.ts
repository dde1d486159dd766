import { logger as rootLogger, type Logger } from '../../core/logger';
import { metrics } from '../../core/metrics';
import type { MessageRecord } from '../../models/message-record';
import type { RecordSink } from '../../sink/record-sink';
import type { Queryable } from '../connection';

const UPSERT_MESSAGE_SQL = `INSERT INTO messages (chat_peer_id, message_id, date, data)
   VALUES ($1, $2, $3, $4)
   ON CONFLICT (chat_peer_id, message_id) DO UPDATE SET
     data = EXCLUDED.data,
     date = EXCLUDED.date,
     updated_at = NOW()`;

export class MessagesRepository implements RecordSink {
  readonly kind = 'database';
  private readonly logger: Logger;

  constructor(
    private readonly db: Queryable,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child('db');
  }

  async write(peerId: number, record: MessageRecord): Promise<boolean> {
    const start = Date.now();
    try {
      await this.db.query(UPSERT_MESSAGE_SQL, [peerId, record.id, record.date, JSON.stringify(record)]);
      metrics.timing('sink_write_ms', Date.now() - start);
      this.logger.debug('Saved message', { peerId, messageId: record.id });
      return true;
    } catch (error) {
      metrics.increment('sink_failures');
      this.logger.error('Error saving message', { peerId, messageId: record.id, error });
      return false;
    }
  }
}
