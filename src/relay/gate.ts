import type { LogResult } from '../types.js';
import { nowMs } from '../utils.js';

interface NotificationGateOptions {
  staleThresholdMs: number;
  now?: () => number;
}

interface PlayerRecord {
  last: number;
  /** Timestamp to restore if the accepted result is never announced. */
  previous?: number;
  pending: boolean;
}

/**
 * Decides which logs are new enough to announce, per player.
 *
 * State is keyed by player and only ever changes inside `shouldDeliver`,
 * `confirm` and `release`. Each runs to completion without yielding, so on the
 * event loop each call is its own critical section: two polls for the same
 * player can never both observe the old timestamp.
 */
export class NotificationGate {
  private readonly records = new Map<string, PlayerRecord>();
  private readonly staleThresholdMs: number;
  private readonly now: () => number;

  constructor(opts: NotificationGateOptions) {
    this.staleThresholdMs = opts.staleThresholdMs;
    this.now = opts.now ?? nowMs;
  }

  shouldDeliver(player: string, result: LogResult): boolean {
    const ageMs = this.now() - result.occurredAt;
    if (ageMs > this.staleThresholdMs) {
      return false;
    }

    const last = this.records.get(player)?.last;
    if (result.occurredAt <= (last ?? 0)) {
      return false;
    }

    this.records.set(player, { last: result.occurredAt, previous: last, pending: true });
    return true;
  }

  /** Marks an accepted result as announced; it can no longer be released. */
  confirm(player: string, result: LogResult): boolean {
    const record = this.records.get(player);
    if (!record?.pending || record.last !== result.occurredAt) {
      return false;
    }
    this.records.set(player, { last: record.last, pending: false });
    return true;
  }

  /**
   * Undo the accept of a result whose announcement never went out, so the next
   * session can still announce it. Skipped if a newer result was accepted since
   * or the result was already confirmed or released.
   */
  release(player: string, result: LogResult): boolean {
    const record = this.records.get(player);
    if (!record?.pending || record.last !== result.occurredAt) {
      return false;
    }

    if (record.previous === undefined) {
      this.records.delete(player);
    } else {
      this.records.set(player, { last: record.previous, pending: false });
    }
    return true;
  }

  lastDeliveredAt(player: string): number | undefined {
    return this.records.get(player)?.last;
  }
}
