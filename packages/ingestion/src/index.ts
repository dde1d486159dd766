#!/usr/bin/env node
import { bootstrap } from './app/bootstrap';
import { FATAL_ERROR_EXIT_CODE } from './core/errors';
import { logger } from './core/logger';

export { IngestionJob } from './app/ingestion-job';
export { runCatchUp } from './app/catch-up-fetcher';
export { LiveTailController } from './app/live-tail-controller';
export { FileCheckpointStore } from './checkpoint/file-checkpoint-store';
export { CheckpointsRepository } from './db/repositories/checkpoints.repo';
export { MessagesRepository } from './db/repositories/messages.repo';
export { StdoutRecordSink } from './sink/stdout-record-sink';
export { toRecord } from './models/message-record';
export type { CheckpointStore } from './checkpoint/checkpoint-store';
export type { RecordSink } from './sink/record-sink';
export type {
  CatchUpResult,
  IngestionSummary,
  MessageSource,
  RawMessage,
  ResolvedTarget,
  TailResult,
  TargetRef,
} from './domain/message.types';

if (require.main === module) {
  bootstrap()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      logger.error('Fatal error', { error });
      process.exit(FATAL_ERROR_EXIT_CODE);
    });
}
