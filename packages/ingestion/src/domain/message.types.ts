/** Chat handle as configured: a numeric peer/chat id or a username/invite link. */
export type TargetRef = number | string;

export interface ResolvedTarget {
  ref: TargetRef;
  peerId: number;
  title: string;
}

/**
 * Message object as delivered by the source. Only `id` is relied upon
 * directly; every other field is read by the normalizer, whose shape varies
 * with the kind of message.
 */
export interface RawMessage {
  readonly id: number;
}

export interface MessageSource {
  resolve(ref: TargetRef): Promise<ResolvedTarget>;
  /** Finite, ascending-id backlog of messages with id > minId sent at or after `since`. */
  fetchMessagesSince(target: ResolvedTarget, minId: number, since: Date): AsyncIterable<RawMessage>;
  /** Infinite stream of new messages for the target; ends once `signal` aborts. */
  subscribeNewMessages(target: ResolvedTarget, signal: AbortSignal): AsyncIterable<RawMessage>;
  close(): Promise<void>;
}

export interface CatchUpResult {
  /** Highest id safe to checkpoint: every accepted message up to it was written. */
  maxId: number;
  /** Highest id taken from the source, written or not. */
  lastSeenId: number;
  count: number;
  skipped: number;
  failed: number;
  aborted: boolean;
}

export type TailState = 'INACTIVE' | 'ACTIVE' | 'STOPPED';

export interface TailResult {
  processed: number;
  duplicates: number;
  failed: number;
  lastSeenId: number;
  lastSavedId: number;
}

export interface IngestionSummary {
  target: ResolvedTarget;
  startCursor: number;
  since: Date;
  catchUp: CatchUpResult;
  tail: TailResult | null;
  finalCursor: number;
}
