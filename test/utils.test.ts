import { describe, expect, it } from 'vitest';
import { getErrorMessage, normalizeChannel, sleep } from '../src/utils.js';

describe('normalizeChannel', () => {
  it('strips the hash prefix and lowercases', () => {
    expect(normalizeChannel('  #Alice ')).toBe('alice');
    expect(normalizeChannel('##bob')).toBe('bob');
    expect(normalizeChannel('carol')).toBe('carol');
  });
});

describe('getErrorMessage', () => {
  it('reads messages from errors, strings and plain objects', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage({ message: 'shaped' })).toBe('shaped');
    expect(getErrorMessage(42)).toBe('unknown error');
  });
});

describe('sleep', () => {
  it('returns early when the signal aborts', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => controller.abort(), 10);

    await sleep(10_000, controller.signal);

    expect(Date.now() - startedAt).toBeLessThan(1_000);
  });

  it('returns immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const startedAt = Date.now();

    await sleep(10_000, controller.signal);

    expect(Date.now() - startedAt).toBeLessThan(100);
  });
});
