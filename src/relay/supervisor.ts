import { EventEmitter } from 'node:events';
import { DeliveryError, NoResultsError } from '../errors.js';
import { logError, logInfo, logWarn } from '../logger.js';
import type { LogsTfClient } from '../logstf/client.js';
import type { ChannelMap, ChatSession, LogResult, PollStage, SupervisorState } from '../types.js';
import { getErrorMessage, sleep } from '../utils.js';
import type { DeliveryPipeline } from './delivery.js';
import type { NotificationGate } from './gate.js';

interface SupervisorDeps {
  channels: ChannelMap;
  createSession: () => ChatSession;
  logs: Pick<LogsTfClient, 'fetchLatest'>;
  gate: NotificationGate;
  delivery: Pick<DeliveryPipeline, 'deliver'>;
  pollIntervalMs: number;
  reconnectBackoffMs: number;
}

interface PollErrorLog {
  signature: string;
  atMs: number;
  suppressed: number;
}

/**
 * Owns the outer connect → run → drain cycle. While a session is live there is
 * exactly one polling loop per tracked player; when the session goes away all
 * loops are cancelled and awaited before the next connection attempt.
 *
 * Emits `state` (SupervisorState) on each transition and `loopStopped`
 * (player) when a polling loop has fully exited.
 */
export class PollingSupervisor extends EventEmitter {
  private static readonly POLL_ERROR_SUPPRESSION_WINDOW_MS = 60_000;

  private state: SupervisorState = 'idle';
  private session: ChatSession | null = null;
  private cycle: Promise<void> | null = null;
  private readonly stopController = new AbortController();
  private readonly pollErrors = new Map<string, PollErrorLog>();

  constructor(private readonly deps: SupervisorDeps) {
    super();
  }

  get currentState(): SupervisorState {
    return this.state;
  }

  /** Runs until `stop()`; connection failures are retried forever. */
  async start(): Promise<void> {
    if (this.cycle) {
      return this.cycle;
    }

    this.cycle = this.runForever();
    return this.cycle;
  }

  async stop(): Promise<void> {
    this.stopController.abort();
    this.session?.close(new Error('relay stopping'));
    if (this.cycle) {
      await this.cycle;
    }
  }

  private async runForever(): Promise<void> {
    const stopSignal = this.stopController.signal;

    while (!stopSignal.aborted) {
      await this.runSession();
      if (stopSignal.aborted) {
        break;
      }

      logInfo(`Reconnecting to chat in ${this.deps.reconnectBackoffMs}ms`);
      await sleep(this.deps.reconnectBackoffMs, stopSignal);
    }

    logInfo('Polling supervisor stopped');
  }

  private async runSession(): Promise<void> {
    this.setState('connecting');
    const session = this.deps.createSession();
    this.session = session;

    try {
      await session.connect();
    } catch (error) {
      logError('Failed to connect to chat server', error);
      session.close();
      this.session = null;
      this.setState('idle');
      return;
    }

    this.setState('running');
    const loopController = new AbortController();
    const loops = [...this.deps.channels].map(([player, channel]) =>
      this.runPlayerLoop(session, player, channel, loopController.signal),
    );
    logInfo(`Started ${loops.length} polling loop(s)`);

    const cause = await session.readLoop();
    if (!this.stopController.signal.aborted) {
      logWarn(`Chat session lost: ${getErrorMessage(cause)}`);
    }

    this.setState('draining');
    loopController.abort();
    const settled = await Promise.allSettled(loops);
    logInfo(`Drained ${settled.length} polling loop(s)`);

    session.close();
    this.session = null;
    this.setState('idle');
  }

  private async runPlayerLoop(session: ChatSession, player: string, channel: string, signal: AbortSignal): Promise<void> {
    try {
      await this.joinChannel(session, player, channel);

      while (!signal.aborted) {
        await sleep(this.deps.pollIntervalMs, signal);
        if (signal.aborted) {
          break;
        }
        await this.pollOnce(session, player, channel, signal);
      }
    } finally {
      this.flushSuppressedPollErrors(player);
      logInfo(`Stopped polling player ${player} for #${channel}`);
      this.emit('loopStopped', player);
    }
  }

  private async joinChannel(session: ChatSession, player: string, channel: string): Promise<void> {
    try {
      await session.join(channel);
      logInfo(`Joined #${channel} for player ${player}`);
    } catch (error) {
      this.handleSessionWriteFailure(session, player, channel, 'join', error);
    }
  }

  private async pollOnce(session: ChatSession, player: string, channel: string, signal: AbortSignal): Promise<void> {
    let result: LogResult;
    try {
      result = await this.deps.logs.fetchLatest(player, signal);
    } catch (error) {
      if (!signal.aborted) {
        this.logPollError(player, channel, error);
      }
      return;
    }

    this.flushSuppressedPollErrors(player);
    if (!this.deps.gate.shouldDeliver(player, result)) {
      return;
    }

    logInfo(`New log id=${result.id} player=${player} channel=#${channel}; announcing after spoiler delay`);
    try {
      await this.deps.delivery.deliver(session, channel, result);
      this.deps.gate.confirm(player, result);
      logInfo(`Sent log id=${result.id} channel=#${channel}`);
    } catch (error) {
      this.deps.gate.release(player, result);
      this.handleSessionWriteFailure(session, player, channel, 'deliver', error);
    }
  }

  /** A failed write means the connection is unusable; closing it ends the read loop and starts draining. */
  private handleSessionWriteFailure(
    session: ChatSession,
    player: string,
    channel: string,
    stage: PollStage,
    error: unknown,
  ): void {
    logError(`Chat write failed player=${player} channel=#${channel} stage=${stage}`, error);
    session.close(
      error instanceof DeliveryError ? error : new DeliveryError(getErrorMessage(error), { cause: error }),
    );
  }

  private logPollError(player: string, channel: string, error: unknown): void {
    const now = Date.now();
    const signature = getErrorMessage(error);
    const previous = this.pollErrors.get(player);
    const withinSuppressionWindow =
      previous !== undefined &&
      previous.signature === signature &&
      now - previous.atMs < PollingSupervisor.POLL_ERROR_SUPPRESSION_WINDOW_MS;

    if (previous && withinSuppressionWindow) {
      previous.suppressed += 1;
      return;
    }

    this.flushSuppressedPollErrors(player);
    const message = `Poll failed player=${player} channel=#${channel} stage=query`;
    if (error instanceof NoResultsError) {
      logWarn(message, { error: signature, body: error.body.slice(0, 200) });
    } else {
      logError(message, error);
    }
    this.pollErrors.set(player, { signature, atMs: now, suppressed: 0 });
  }

  private flushSuppressedPollErrors(player: string): void {
    const entry = this.pollErrors.get(player);
    if (!entry) {
      return;
    }

    this.pollErrors.delete(player);
    if (entry.suppressed < 1) {
      return;
    }

    logWarn(`Poll error for player ${player} repeated ${entry.suppressed} additional time(s)`, {
      error: entry.signature,
      windowMs: PollingSupervisor.POLL_ERROR_SUPPRESSION_WINDOW_MS,
    });
  }

  private setState(next: SupervisorState): void {
    if (this.state === next) {
      return;
    }
    this.state = next;
    this.emit('state', next);
  }
}
