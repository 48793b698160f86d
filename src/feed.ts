// =============================================================================
// Live Update Feed
// Server-sent events, one fresh synthetic sample per tick. No backlog:
// a slow reader only ever misses samples, it never queues them.
// =============================================================================

import { SyntheticMarketDataGenerator } from './synthetic-gen';
import type { Logger } from './logger';

export const DEFAULT_FEED_INTERVAL_MS = 5000;

export interface PriceFeedOptions {
  intervalMs?: number;
  /** The feed ends when any of these aborts (client disconnect, server shutdown) */
  signals?: AbortSignal[];
  logger?: Logger;
}

export function formatEvent(data: unknown): string {
  return `data: ${JSON.stringify(data)}\n\n`;
}

/**
 * Stream that emits one sample immediately, then one per interval,
 * until the reader cancels or one of the signals aborts.
 */
export function createPriceFeed(
  generator: SyntheticMarketDataGenerator,
  options: PriceFeedOptions = {}
): ReadableStream<Uint8Array> {
  const intervalMs = options.intervalMs ?? DEFAULT_FEED_INTERVAL_MS;
  const signals = options.signals ?? [];
  const encoder = new TextEncoder();
  let timer: ReturnType<typeof setInterval> | undefined;
  let onAbort: (() => void) | undefined;

  const stop = () => {
    if (timer !== undefined) {
      clearInterval(timer);
      timer = undefined;
    }
    if (onAbort) {
      for (const signal of signals) {
        signal.removeEventListener('abort', onAbort);
      }
      onAbort = undefined;
    }
  };

  return new ReadableStream<Uint8Array>(
    {
      start(controller) {
        if (signals.some((signal) => signal.aborted)) {
          controller.close();
          return;
        }

        const emit = () => {
          // Drop the sample rather than buffer it when the reader is behind
          if (controller.desiredSize !== null && controller.desiredSize <= 0) {
            options.logger?.debug('Feed reader behind, sample dropped');
            return;
          }
          controller.enqueue(encoder.encode(formatEvent(generator.samplePriceUpdate())));
        };

        onAbort = () => {
          stop();
          controller.close();
        };
        for (const signal of signals) {
          signal.addEventListener('abort', onAbort);
        }

        emit();
        timer = setInterval(emit, intervalMs);
      },
      cancel() {
        stop();
      },
    },
    { highWaterMark: 1 }
  );
}
