/** Steam ID → Twitch channel (without `#`). Loaded once, never mutated. */
export type ChannelMap = ReadonlyMap<string, string>;

export interface LogResult {
  id: number;
  /** Epoch milliseconds. */
  occurredAt: number;
  title: string;
}

export type SessionState = 'disconnected' | 'connecting' | 'handshaking' | 'live' | 'closed';

export type SupervisorState = 'idle' | 'connecting' | 'running' | 'draining';

export type PollStage = 'join' | 'query' | 'deliver';

/** The slice of a chat session the polling loops write through. */
export interface ChatSink {
  join(channel: string): Promise<void>;
  sendMessage(channel: string, text: string): Promise<void>;
}

/** One connection lifetime, as the supervisor drives it. */
export interface ChatSession extends ChatSink {
  connect(): Promise<void>;
  readLoop(): Promise<Error>;
  close(reason?: Error): void;
}
