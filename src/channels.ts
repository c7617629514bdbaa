import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { ChannelMap } from './types.js';
import { normalizeChannel } from './utils.js';

const channelMapSchema = z
  .record(
    z.string().trim().min(1, 'player id must not be empty'),
    z.string().transform(normalizeChannel).pipe(z.string().min(1, 'channel must not be empty')),
  )
  .refine((value) => Object.keys(value).length > 0, 'at least one player must be tracked');

export function parseChannelMap(raw: string, source = 'channel map'): ChannelMap {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${source} is not valid JSON`, { cause: error });
  }

  const parsed = channelMapSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`${source} is malformed: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`, {
      cause: parsed.error,
    });
  }

  return new Map(Object.entries(parsed.data));
}

export async function loadChannelMap(filePath: string): Promise<ChannelMap> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Failed to read channel map ${filePath}`, { cause: error });
  }
  return parseChannelMap(raw, filePath);
}
