export type CheckpointBackend = 'file' | 'database';

/**
 * Persists the highest processed message id per peer.
 *
 * Implementations never throw from these methods: `load` falls back to 0 and
 * the writers report failure as `false` after logging it. `save` never lowers
 * a stored value; `reset` is the only way back to 0.
 */
export interface CheckpointStore {
  readonly kind: CheckpointBackend;
  load(peerId: number): Promise<number>;
  save(peerId: number, cursor: number): Promise<boolean>;
  reset(peerId: number): Promise<boolean>;
}

export function isValidCursor(cursor: number): boolean {
  return Number.isSafeInteger(cursor) && cursor >= 0;
}
