import { createConnection } from 'node:net';
import type { Duplex } from 'node:stream';
import { ConnectError, DeliveryError } from '../errors.js';
import { logDebug, logInfo, logWarn } from '../logger.js';
import type { ChatSession, SessionState } from '../types.js';
import { getErrorMessage } from '../utils.js';

export type Dialer = (host: string, port: number, timeoutMs: number) => Promise<Duplex>;

export interface IrcSessionOptions {
  host: string;
  port: number;
  username: string;
  oauthKey: string;
  /** Used in PONG replies when the PING names no server. */
  serverName: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  dial?: Dialer;
}

export const dialTcp: Dialer = (host, port, timeoutMs) =>
  new Promise((resolve, reject) => {
    const socket = createConnection({ host, port });
    const onError = (error: Error): void => {
      clearTimeout(timer);
      reject(error);
    };
    const timer = setTimeout(() => {
      socket.off('error', onError);
      socket.destroy();
      reject(new Error(`connect to ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      resolve(socket);
    });
  });

/** Longest inbound line accepted before the session is dropped. */
export const MAX_LINE_LENGTH = 8192;

const PING_PATTERN = /^(?:@\S+ +)?(?::\S+ +)?PING(?: +:?(.*))?$/;

/** The PONG line answering `line`, or null when `line` is not a keep-alive PING. */
export function keepAliveReply(line: string, defaultServer: string): string | null {
  const match = PING_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const server = match[1]?.trim();
  return `PONG :${server && server.length > 0 ? server : defaultServer}`;
}

function sanitizeLine(line: string): string {
  return line.replace(/[\r\n]+/g, ' ');
}

/**
 * One connection to the chat server, from handshake until loss. Sessions are
 * single-use: after `closed` a fresh instance is needed.
 */
export class IrcSession implements ChatSession {
  private readonly opts: IrcSessionOptions;
  private transport: Duplex | null = null;
  private state: SessionState = 'disconnected';
  private readBuffer = '';
  private writeQueue: Promise<void> = Promise.resolve();
  private idleTimer: NodeJS.Timeout | null = null;
  private readonly lost: Promise<Error>;
  private resolveLost: (error: Error) => void = () => undefined;

  constructor(opts: IrcSessionOptions) {
    this.opts = opts;
    this.lost = new Promise((resolve) => {
      this.resolveLost = resolve;
    });
  }

  get currentState(): SessionState {
    return this.state;
  }

  get isLive(): boolean {
    return this.state === 'live';
  }

  async connect(): Promise<void> {
    if (this.state !== 'disconnected') {
      throw new ConnectError(`IRC session cannot connect from state ${this.state}`);
    }

    this.state = 'connecting';
    const dial = this.opts.dial ?? dialTcp;
    let transport: Duplex;
    try {
      transport = await dial(this.opts.host, this.opts.port, this.opts.connectTimeoutMs);
    } catch (error) {
      this.markLost(error instanceof Error ? error : new Error(getErrorMessage(error)));
      throw new ConnectError(`Failed to connect to ${this.opts.host}:${this.opts.port}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    if (this.state !== 'connecting') {
      // closed while dialing
      transport.destroy();
      throw new ConnectError('IRC session closed while connecting');
    }

    this.transport = transport;
    this.attachTransport(transport);
    this.state = 'handshaking';

    try {
      await this.send(`PASS ${this.opts.oauthKey}`);
      await this.send(`NICK ${this.opts.username}`);
    } catch (error) {
      this.markLost(error instanceof Error ? error : new Error(getErrorMessage(error)));
      throw new ConnectError(`IRC handshake failed: ${getErrorMessage(error)}`, { cause: error });
    }

    if (this.state === 'handshaking') {
      this.state = 'live';
      logInfo(`Connected to IRC ${this.opts.host}:${this.opts.port} as ${this.opts.username}`);
    }
  }

  /**
   * Resolves with the cause once the connection is gone (read error, EOF,
   * close, or no input for the read timeout). Inbound lines are consumed as
   * they arrive; only keep-alive PINGs are answered.
   */
  readLoop(): Promise<Error> {
    return this.lost;
  }

  join(channel: string): Promise<void> {
    return this.send(`JOIN #${channel}`);
  }

  sendMessage(channel: string, text: string): Promise<void> {
    return this.send(`PRIVMSG #${channel} :${text}`);
  }

  close(reason?: Error): void {
    this.markLost(reason ?? new Error('session closed'));
  }

  /** Queues one line behind every earlier write; lines are never interleaved. */
  private send(line: string): Promise<void> {
    const task = this.writeQueue.then(() => this.writeLine(line));
    this.writeQueue = task.then(
      () => undefined,
      () => undefined,
    );
    return task;
  }

  private writeLine(line: string): Promise<void> {
    const transport = this.transport;
    if (!transport || (this.state !== 'live' && this.state !== 'handshaking')) {
      return Promise.reject(new DeliveryError(`IRC session is ${this.state}; write refused`));
    }

    return new Promise((resolve, reject) => {
      transport.write(`${sanitizeLine(line)}\r\n`, (error) => {
        if (error) {
          reject(new DeliveryError(`IRC write failed: ${error.message}`, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  private attachTransport(transport: Duplex): void {
    transport.setEncoding('utf8');
    transport.on('data', (chunk: string | Buffer) => {
      this.armIdleTimer();
      this.handleData(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
    });
    transport.on('end', () => {
      this.markLost(new Error('connection closed by server'));
    });
    transport.on('close', () => {
      this.markLost(new Error('connection closed'));
    });
    transport.on('error', (error: Error) => {
      this.markLost(error);
    });
    this.armIdleTimer();
  }

  private handleData(chunk: string): void {
    this.readBuffer += chunk;

    while (true) {
      const newlineIndex = this.readBuffer.indexOf('\n');
      if (newlineIndex === -1) {
        break;
      }

      const line = this.readBuffer.slice(0, newlineIndex).replace(/\r$/, '');
      this.readBuffer = this.readBuffer.slice(newlineIndex + 1);

      if (line.length === 0) {
        continue;
      }

      this.handleLine(line);
    }

    if (this.readBuffer.length > MAX_LINE_LENGTH) {
      this.readBuffer = '';
      this.markLost(new Error(`IRC line exceeded ${MAX_LINE_LENGTH} characters`));
    }
  }

  private handleLine(line: string): void {
    const reply = keepAliveReply(line, this.opts.serverName);
    if (!reply) {
      return;
    }

    logDebug(`IRC keep-alive: ${reply}`);
    void this.send(reply).catch((error: unknown) => {
      logWarn('Failed to answer IRC keep-alive', error);
    });
  }

  private armIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
    }
    this.idleTimer = setTimeout(() => {
      this.markLost(new Error(`no data from IRC server for ${this.opts.readTimeoutMs}ms`));
    }, this.opts.readTimeoutMs);
  }

  private markLost(error: Error): void {
    if (this.state === 'closed') {
      return;
    }

    this.state = 'closed';
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }

    const transport = this.transport;
    this.transport = null;
    transport?.destroy();

    this.resolveLost(error);
  }
}
