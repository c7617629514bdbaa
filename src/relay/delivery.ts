import { DeliveryError } from '../errors.js';
import type { ChatSink, LogResult } from '../types.js';
import { getErrorMessage, nowMs, sleep } from '../utils.js';

interface DeliveryPipelineOptions {
  spoilerDelayMs: number;
  linkBase: string;
  announceElapsed: boolean;
  now?: () => number;
}

export function formatLogAnnouncement(
  linkBase: string,
  result: LogResult,
  elapsedMs?: number,
): string {
  const link = `${linkBase.replace(/\/+$/, '')}/${result.id}`;
  if (elapsedMs === undefined) {
    return link;
  }
  const minutes = Math.max(1, Math.ceil(elapsedMs / 60_000));
  return `${link} (${minutes} min ago)`;
}

export class DeliveryPipeline {
  private readonly now: () => number;

  constructor(private readonly opts: DeliveryPipelineOptions) {
    this.now = opts.now ?? nowMs;
  }

  /**
   * Holds the announcement back for the spoiler delay, then posts it. The
   * delay is not cancellable: once a log is accepted it is either written or
   * refused by a session that has gone away, which surfaces as DeliveryError.
   * The elapsed time, when announced, is taken at accept time, before the delay.
   */
  async deliver(session: ChatSink, channel: string, result: LogResult): Promise<void> {
    const elapsedMs = this.opts.announceElapsed ? this.now() - result.occurredAt : undefined;
    await sleep(this.opts.spoilerDelayMs);

    const text = formatLogAnnouncement(this.opts.linkBase, result, elapsedMs);

    try {
      await session.sendMessage(channel, text);
    } catch (error) {
      if (error instanceof DeliveryError) {
        throw error;
      }
      throw new DeliveryError(`Failed to announce log ${result.id} in #${channel}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
