import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import { logger as rootLogger, type Logger } from '../core/logger';
import { metrics } from '../core/metrics';
import { isValidCursor, type CheckpointStore } from './checkpoint-store';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** One plain-text file per peer under the state directory, holding just the integer cursor. */
export class FileCheckpointStore implements CheckpointStore {
  readonly kind = 'file';
  private readonly logger: Logger;

  constructor(
    private readonly stateDir: string,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child('state');
  }

  stateFile(peerId: number): string {
    return join(this.stateDir, String(peerId));
  }

  async load(peerId: number): Promise<number> {
    const file = this.stateFile(peerId);
    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info('No state file found, starting from 0', { file });
      } else {
        this.logger.warn('Failed to read state file, starting from 0', { file, error });
      }
      return 0;
    }

    const trimmed = content.trim();
    const cursor = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
    if (!isValidCursor(cursor)) {
      this.logger.warn('Corrupt state file, starting from 0', { file, content: trimmed.slice(0, 40) });
      return 0;
    }
    return cursor;
  }

  async save(peerId: number, cursor: number): Promise<boolean> {
    if (!isValidCursor(cursor)) {
      this.logger.error('Refusing to save invalid cursor', { peerId, cursor });
      return false;
    }

    const current = await this.load(peerId);
    if (cursor <= current) {
      if (cursor < current) {
        this.logger.debug('Keeping higher stored cursor', { peerId, stored: current, requested: cursor });
      }
      return true;
    }
    return this.write(peerId, cursor);
  }

  async reset(peerId: number): Promise<boolean> {
    return this.write(peerId, 0);
  }

  private async write(peerId: number, cursor: number): Promise<boolean> {
    const file = this.stateFile(peerId);
    const tempFile = `${file}.tmp`;
    try {
      await mkdir(this.stateDir, { recursive: true });
      await writeFile(tempFile, String(cursor), 'utf-8');
      await rename(tempFile, file);
      metrics.increment('checkpoint_saves');
      return true;
    } catch (error) {
      metrics.increment('checkpoint_save_failures');
      this.logger.error('Failed to save state file', { file, cursor, error });
      return false;
    }
  }
}
