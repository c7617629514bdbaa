import { afterEach, describe, expect, it, vi } from 'vitest';
import { DeliveryError } from '../src/errors.js';
import { DeliveryPipeline, formatLogAnnouncement } from '../src/relay/delivery.js';

function createSink(sendMessage: (channel: string, text: string) => Promise<void> = async () => undefined) {
  return {
    join: vi.fn(async () => undefined),
    sendMessage: vi.fn(sendMessage),
  };
}

describe('formatLogAnnouncement', () => {
  it('links the log', () => {
    expect(formatLogAnnouncement('http://logs.tf/', { id: 55, occurredAt: 0, title: 'x' })).toBe('http://logs.tf/55');
  });

  it('appends the elapsed minutes rounded up', () => {
    const result = { id: 55, occurredAt: 0, title: 'x' };

    expect(formatLogAnnouncement('http://logs.tf', result, 20_000)).toBe('http://logs.tf/55 (1 min ago)');
    expect(formatLogAnnouncement('http://logs.tf', result, 61_000)).toBe('http://logs.tf/55 (2 min ago)');
  });
});

describe('DeliveryPipeline.deliver', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('announces only after the spoiler delay', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
    const sink = createSink();
    const pipeline = new DeliveryPipeline({ spoilerDelayMs: 15_000, linkBase: 'http://logs.tf', announceElapsed: false });

    const pending = pipeline.deliver(sink, 'alice', { id: 55, occurredAt: Date.now() - 5_000, title: 'x' });
    await vi.advanceTimersByTimeAsync(14_999);
    expect(sink.sendMessage).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await pending;

    expect(sink.sendMessage).toHaveBeenCalledTimes(1);
    expect(sink.sendMessage).toHaveBeenCalledWith('alice', 'http://logs.tf/55');
  });

  it('reports elapsed time measured before the spoiler delay when enabled', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
    const sink = createSink();
    const pipeline = new DeliveryPipeline({ spoilerDelayMs: 15_000, linkBase: 'http://logs.tf', announceElapsed: true });

    const pending = pipeline.deliver(sink, 'alice', { id: 55, occurredAt: Date.now() - 50_000, title: 'x' });
    await vi.advanceTimersByTimeAsync(15_000);
    await pending;

    expect(sink.sendMessage).toHaveBeenCalledWith('alice', 'http://logs.tf/55 (1 min ago)');
  });

  it('wraps write failures in DeliveryError', async () => {
    const sink = createSink(async () => {
      throw new Error('write EPIPE');
    });
    const pipeline = new DeliveryPipeline({ spoilerDelayMs: 0, linkBase: 'http://logs.tf', announceElapsed: false });

    const error = await pipeline
      .deliver(sink, 'alice', { id: 55, occurredAt: Date.now(), title: 'x' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toHaveProperty('message', 'Failed to announce log 55 in #alice: write EPIPE');
    expect(sink.sendMessage).toHaveBeenCalledTimes(1);
  });

  it('passes a DeliveryError from the session through unchanged', async () => {
    const refused = new DeliveryError('IRC session is closed; write refused');
    const sink = createSink(async () => {
      throw refused;
    });
    const pipeline = new DeliveryPipeline({ spoilerDelayMs: 0, linkBase: 'http://logs.tf', announceElapsed: false });

    await expect(pipeline.deliver(sink, 'alice', { id: 55, occurredAt: Date.now(), title: 'x' })).rejects.toBe(refused);
  });
});
