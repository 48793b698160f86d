import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createPriceFeed, formatEvent } from './feed';
import { SyntheticMarketDataGenerator } from './synthetic-gen';
import { mulberry32 } from './random';
import { PriceUpdate } from './types';

function parseEvent(chunk: Uint8Array | undefined): PriceUpdate {
  const text = new TextDecoder().decode(chunk);
  expect(text.startsWith('data: ')).toBe(true);
  expect(text.endsWith('\n\n')).toBe(true);
  return JSON.parse(text.slice('data: '.length));
}

describe('formatEvent', () => {
  it('should frame JSON as a server-sent event', () => {
    expect(formatEvent({ a: 1 })).toBe('data: {"a":1}\n\n');
  });
});

describe('createPriceFeed', () => {
  let generator: SyntheticMarketDataGenerator;

  beforeEach(() => {
    vi.useFakeTimers();
    generator = new SyntheticMarketDataGenerator({
      random: mulberry32(5),
      now: () => new Date('2026-01-15T12:00:00Z'),
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should emit a sample immediately', async () => {
    const reader = createPriceFeed(generator, { intervalMs: 1000 }).getReader();
    const first = await reader.read();

    expect(first.done).toBe(false);
    const update = parseEvent(first.value);
    expect(update.type).toBe('price_update');
    expect(update.timestamp).toBe('2026-01-15T12:00:00.000Z');
    await reader.cancel();
  });

  it('should emit one sample per interval', async () => {
    const reader = createPriceFeed(generator, { intervalMs: 1000 }).getReader();
    await reader.read();

    vi.advanceTimersByTime(1000);
    const second = await reader.read();
    expect(second.done).toBe(false);
    expect(parseEvent(second.value).type).toBe('price_update');
    await reader.cancel();
  });

  it('should drop samples instead of queueing them for a slow reader', async () => {
    const spy = vi.spyOn(generator, 'samplePriceUpdate');
    const reader = createPriceFeed(generator, { intervalMs: 1000 }).getReader();

    // First sample is still unread, so the next five ticks are dropped
    vi.advanceTimersByTime(5000);
    expect(spy).toHaveBeenCalledTimes(1);

    await reader.read();
    vi.advanceTimersByTime(1000);
    expect(spy).toHaveBeenCalledTimes(2);
    await reader.cancel();
  });

  it('should clear its timer when cancelled', async () => {
    const reader = createPriceFeed(generator, { intervalMs: 1000 }).getReader();
    await reader.read();
    expect(vi.getTimerCount()).toBe(1);

    await reader.cancel();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should close when the signal aborts', async () => {
    const controller = new AbortController();
    const reader = createPriceFeed(generator, {
      intervalMs: 1000,
      signals: [controller.signal],
    }).getReader();
    await reader.read();

    controller.abort();
    const next = await reader.read();
    expect(next.done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should close when any one of several signals aborts', async () => {
    const client = new AbortController();
    const shutdown = new AbortController();
    const reader = createPriceFeed(generator, {
      intervalMs: 1000,
      signals: [client.signal, shutdown.signal],
    }).getReader();
    await reader.read();

    shutdown.abort();
    expect((await reader.read()).done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);

    // Listener on the other signal is gone; a late abort is a no-op
    client.abort();
  });

  it('should close at once for an already aborted signal', async () => {
    const reader = createPriceFeed(generator, { signals: [AbortSignal.abort()] }).getReader();
    expect((await reader.read()).done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });
});
