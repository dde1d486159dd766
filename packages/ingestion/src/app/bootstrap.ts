import type { CheckpointStore } from '../checkpoint/checkpoint-store';
import { FileCheckpointStore } from '../checkpoint/file-checkpoint-store';
import { loadConfig, loadDotenv, type IngestionConfig, type RawEnv } from '../config/env';
import {
  CONFIG_ERROR_EXIT_CODE,
  ConfigError,
  FATAL_ERROR_EXIT_CODE,
  FORCED_EXIT_CODE,
} from '../core/errors';
import { logger } from '../core/logger';
import { metrics } from '../core/metrics';
import { createPool, DatabaseHandle, runMigrations } from '../db/connection';
import { CheckpointsRepository } from '../db/repositories/checkpoints.repo';
import { MessagesRepository } from '../db/repositories/messages.repo';
import type { MessageSource } from '../domain/message.types';
import type { RecordSink } from '../sink/record-sink';
import { StdoutRecordSink } from '../sink/stdout-record-sink';
import { connectAuthorized, createTelegramClient } from '../telegram/client';
import { TelegramMessageSource } from '../telegram/telegram.source';
import { IngestionJob } from './ingestion-job';

export interface Backends {
  store: CheckpointStore;
  sink: RecordSink;
  database: DatabaseHandle | null;
}

/** Resource factories; the defaults open PostgreSQL or the state dir, and a Telegram connection. */
export interface BootstrapDependencies {
  openBackends(config: IngestionConfig): Promise<Backends>;
  openSource(config: IngestionConfig): Promise<MessageSource>;
}

export async function openBackends(config: IngestionConfig): Promise<Backends> {
  if (config.backend === 'database' && config.databaseUrl) {
    const database = new DatabaseHandle(createPool(config.databaseUrl), logger.child('db'));
    logger.info('[db] DATABASE_URL detected, database mode enabled');
    try {
      await runMigrations(database.pool, undefined, logger.child('db'));
    } catch (error) {
      await database.close();
      throw error;
    }
    return {
      store: new CheckpointsRepository(database.pool, logger),
      sink: new MessagesRepository(database.pool, logger),
      database,
    };
  }

  return {
    store: new FileCheckpointStore(config.stateDir, logger),
    sink: new StdoutRecordSink(),
    database: null,
  };
}

export async function openTelegramSource(config: IngestionConfig): Promise<MessageSource> {
  const client = createTelegramClient({ ...config, logger });
  const source = new TelegramMessageSource(client, logger);
  try {
    await connectAuthorized(client);
  } catch (error) {
    await source.close();
    throw error;
  }
  return source;
}

const defaultDependencies: BootstrapDependencies = {
  openBackends,
  openSource: openTelegramSource,
};

/** Aborts on the first SIGINT/SIGTERM so the run can checkpoint; a second one exits at once. */
export function installSignalHandlers(controller: AbortController): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn(`Received second ${signal}, exiting without final checkpoint`);
      process.exit(FORCED_EXIT_CODE);
    }
    logger.info(`[signal] Received ${signal}, shutting down gracefully...`);
    controller.abort();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

export async function bootstrap(
  argv: string[] = process.argv.slice(2),
  env: RawEnv = process.env,
  deps: BootstrapDependencies = defaultDependencies,
): Promise<number> {
  const startedAt = Date.now();
  loadDotenv();

  let config: IngestionConfig;
  try {
    config = loadConfig(argv, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) logger.error(`Configuration error: ${issue}`);
      return CONFIG_ERROR_EXIT_CODE;
    }
    throw error;
  }
  logger.setLevel(config.logLevel);

  const controller = new AbortController();
  const removeSignalHandlers = installSignalHandlers(controller);

  let source: MessageSource | null = null;
  let backends: Backends | null = null;
  let job: IngestionJob | null = null;
  let exitCode = 0;

  try {
    backends = await deps.openBackends(config);
    source = await deps.openSource(config);

    job = new IngestionJob({ source, store: backends.store, sink: backends.sink, logger }, config);
    const summary = await job.run(controller.signal);

    if (controller.signal.aborted) {
      logger.info('[signal] Shutdown gracefully by user', { finalCursor: summary.finalCursor });
    }
  } catch (error) {
    logger.error('[fatal] Unhandled exception', {
      error,
      cursor: job ? job.currentCursor : null,
    });
    exitCode = FATAL_ERROR_EXIT_CODE;
  } finally {
    removeSignalHandlers();
    if (source) {
      try {
        await source.close();
      } catch (error) {
        logger.error('Error closing Telegram client', { error });
      }
    }
    if (backends?.database) {
      await backends.database.close();
    }
    logger.info('Run metrics', metrics.getSnapshot());
    logger.info(`[exit] Script finished in ${((Date.now() - startedAt) / 1000).toFixed(1)}s`);
  }

  return exitCode;
}
