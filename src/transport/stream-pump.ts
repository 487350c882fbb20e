/**
 * Polling pump between a byte transport and the frame consumer.
 */

import { FrameExtractor } from '../protocol/framer';
import { POLL_INTERVAL_MS } from '../protocol/constants';
import { HandoffQueue } from './handoff-queue';
import type { ByteTransport } from './types';

/**
 * Events delivered to the consumer, in the order they were produced.
 *
 * A `raw` event carries each chunk exactly as read; the `frame` events for the
 * frames that chunk completed follow it.
 */
export type PumpEvent =
  | { readonly kind: 'raw'; readonly data: Uint8Array }
  | { readonly kind: 'frame'; readonly frame: Uint8Array }
  | { readonly kind: 'error'; readonly error: Error };

export interface StreamPumpOptions {
  /** Sleep between polls that find no data (default: 5ms) */
  pollIntervalMs?: number;

  /** Upper bound on bytes per read (default: all available) */
  readChunkSize?: number;
}

type SleepState = {
  timer: ReturnType<typeof setTimeout> | null;
  resolve: (() => void) | null;
};

export function normalizePositiveInteger(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) return fallback;
  return Math.floor(value);
}

/**
 * Drains a {@link ByteTransport} on its own loop and hands frames to the
 * consumer through {@link events}.
 *
 * The pump is the only owner of its {@link FrameExtractor}. Consumers never
 * see the extractor, only the events it produces.
 *
 * @example
 * ```typescript
 * const pump = new StreamPump(transport);
 * pump.start();
 * const event = await pump.events.dequeue();
 * await pump.stop();
 * ```
 */
export class StreamPump {
  readonly events = new HandoffQueue<PumpEvent>();

  private readonly extractor = new FrameExtractor();
  private readonly pollIntervalMs: number;
  private readonly readChunkSize: number;
  private running = false;
  private loop: Promise<void> | null = null;
  private sleepState: SleepState = { timer: null, resolve: null };

  constructor(
    private readonly transport: ByteTransport,
    options: StreamPumpOptions = {}
  ) {
    this.pollIntervalMs = normalizePositiveInteger(options.pollIntervalMs, POLL_INTERVAL_MS);
    this.readChunkSize = normalizePositiveInteger(
      options.readChunkSize,
      Number.MAX_SAFE_INTEGER
    );
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Start polling. Calling start on a running pump has no effect.
   */
  start(): void {
    if (this.loop) {
      return;
    }
    this.running = true;
    this.loop = this.run();
  }

  /**
   * Ask the loop to exit and wait for the pass in progress to finish.
   *
   * A read in flight is allowed to complete; its events are still delivered.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.wakeSleep();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
  }

  private async run(): Promise<void> {
    try {
      while (this.running) {
        const available = this.transport.bytesAvailable();
        if (available > 0) {
          this.pumpOnce(Math.min(available, this.readChunkSize));
          // Yield so transport I/O callbacks can run between reads.
          await new Promise<void>((resolve) => setImmediate(resolve));
        } else {
          await this.sleep(this.pollIntervalMs);
        }
      }
    } catch (error) {
      console.warn(`Stream pump stopped on transport error: ${String(error)}`);
      this.events.enqueue({
        kind: 'error',
        error: error instanceof Error ? error : new Error(String(error)),
      });
    } finally {
      this.running = false;
    }
  }

  private pumpOnce(maxBytes: number): void {
    const data = this.transport.read(maxBytes);
    if (data.length === 0) {
      return;
    }
    this.events.enqueue({ kind: 'raw', data });
    for (const frame of this.extractor.feed(data)) {
      this.events.enqueue({ kind: 'frame', frame });
    }
  }

  private async sleep(ms: number): Promise<void> {
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.sleepState = { timer: null, resolve: null };
        resolve();
      }, ms);
      this.sleepState = { timer, resolve };
    });
  }

  private wakeSleep(): void {
    if (this.sleepState.timer !== null) {
      clearTimeout(this.sleepState.timer);
    }
    if (this.sleepState.resolve) {
      this.sleepState.resolve();
    }
    this.sleepState = { timer: null, resolve: null };
  }
}
