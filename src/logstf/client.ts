import { z } from 'zod';
import { NoResultsError, QueryError } from '../errors.js';
import type { LogResult } from '../types.js';
import { getErrorMessage } from '../utils.js';

interface LogsTfConfig {
  apiBase: string;
  requestTimeoutMs?: number;
}

const logSchema = z.object({
  id: z.number().int(),
  date: z.number().int(),
  title: z.string().nullish().transform((value) => value ?? ''),
});

const searchResponseSchema = z.object({
  success: z.boolean(),
  results: z.number().int().default(0),
  logs: z.array(logSchema).default([]),
});

interface FetchedBody {
  ok: boolean;
  status: number;
  body: string;
}

export class LogsTfClient {
  private static readonly DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

  private readonly apiBase: string;
  private readonly requestTimeoutMs: number;

  constructor(config: LogsTfConfig) {
    this.apiBase = config.apiBase.replace(/\/+$/, '');
    this.requestTimeoutMs = Math.max(100, config.requestTimeoutMs ?? LogsTfClient.DEFAULT_REQUEST_TIMEOUT_MS);
  }

  /**
   * Most recent log the player appears in. Throws `NoResultsError` when the
   * service has none and `QueryError` for everything else; never retries.
   */
  async fetchLatest(player: string, signal?: AbortSignal): Promise<LogResult> {
    const params = new URLSearchParams({ player, limit: '1' });
    const endpoint = `${this.apiBase}/json_search?${params.toString()}`;

    let body: string;
    try {
      const response = await this.fetchWithTimeout(endpoint, signal);
      body = response.body;
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${body.slice(0, 200)}`);
      }
    } catch (error) {
      throw new QueryError(`logs.tf search failed for player ${player}: ${getErrorMessage(error)}`, player, {
        cause: error,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch (error) {
      throw new QueryError(`logs.tf returned invalid JSON for player ${player}`, player, { cause: error });
    }

    const parsed = searchResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new QueryError(`Unexpected logs.tf search response: ${parsed.error.message}`, player, {
        cause: parsed.error,
      });
    }

    const [latest] = parsed.data.logs;
    if (!parsed.data.success || parsed.data.results < 1 || !latest) {
      throw new NoResultsError(player, body);
    }

    return {
      id: latest.id,
      occurredAt: latest.date * 1000,
      title: latest.title,
    };
  }

  /** The timeout and the caller's signal stay armed until the whole body is read. */
  private async fetchWithTimeout(url: string, signal?: AbortSignal): Promise<FetchedBody> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { accept: 'application/json' },
        signal: controller.signal,
      });
      const body = await response.text();
      return { ok: response.ok, status: response.status, body };
    } catch (error) {
      if (controller.signal.aborted || this.isAbortError(error)) {
        throw new Error(
          signal?.aborted ? 'request cancelled' : `request timed out after ${this.requestTimeoutMs}ms`,
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private isAbortError(error: unknown): boolean {
    if (!error || typeof error !== 'object') {
      return false;
    }
    const record = error as Record<string, unknown>;
    return record.name === 'AbortError';
  }
}
