import { z } from 'zod';
import type { CheckpointStore } from '../../checkpoint/checkpoint-store';
import { isValidCursor } from '../../checkpoint/checkpoint-store';
import { logger as rootLogger, type Logger } from '../../core/logger';
import { metrics } from '../../core/metrics';
import type { Queryable } from '../connection';

const StateRowSchema = z.object({
  last_message_id: z.coerce.number(),
});

const SELECT_STATE_SQL = 'SELECT last_message_id FROM scraper_state WHERE chat_peer_id = $1';

// GREATEST keeps the stored cursor monotonic even if a stale value is written.
const SAVE_STATE_SQL = `INSERT INTO scraper_state (chat_peer_id, last_message_id, last_run_at)
   VALUES ($1, $2, NOW())
   ON CONFLICT (chat_peer_id) DO UPDATE SET
     last_message_id = GREATEST(scraper_state.last_message_id, EXCLUDED.last_message_id),
     last_run_at = NOW()`;

const RESET_STATE_SQL = `INSERT INTO scraper_state (chat_peer_id, last_message_id, last_run_at)
   VALUES ($1, 0, NOW())
   ON CONFLICT (chat_peer_id) DO UPDATE SET
     last_message_id = 0,
     last_run_at = NOW()`;

export class CheckpointsRepository implements CheckpointStore {
  readonly kind = 'database';
  private readonly logger: Logger;

  constructor(
    private readonly db: Queryable,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child('state');
  }

  async load(peerId: number): Promise<number> {
    try {
      const res = await this.db.query(SELECT_STATE_SQL, [peerId]);
      if (res.rows.length === 0) {
        this.logger.info('No stored cursor found, starting from 0', { peerId });
        return 0;
      }
      const row = StateRowSchema.safeParse(res.rows[0]);
      if (!row.success || !isValidCursor(row.data.last_message_id)) {
        this.logger.warn('Corrupt stored cursor, starting from 0', { peerId });
        return 0;
      }
      return row.data.last_message_id;
    } catch (error) {
      this.logger.warn('Error reading cursor from database, starting from 0', { peerId, error });
      return 0;
    }
  }

  async save(peerId: number, cursor: number): Promise<boolean> {
    if (!isValidCursor(cursor)) {
      this.logger.error('Refusing to save invalid cursor', { peerId, cursor });
      return false;
    }
    return this.write(SAVE_STATE_SQL, [peerId, cursor]);
  }

  async reset(peerId: number): Promise<boolean> {
    return this.write(RESET_STATE_SQL, [peerId]);
  }

  private async write(sql: string, values: unknown[]): Promise<boolean> {
    try {
      await this.db.query(sql, values);
      metrics.increment('checkpoint_saves');
      return true;
    } catch (error) {
      metrics.increment('checkpoint_save_failures');
      this.logger.error('Error saving cursor to database', { peerId: values[0], error });
      return false;
    }
  }
}
