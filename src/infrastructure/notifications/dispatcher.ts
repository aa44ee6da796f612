import type { Logger } from 'pino';
import type { LogEvent } from '../../domain/index.js';
import { SinkDeliveryFailedError } from '../../domain/index.js';
import { STOP_SIGNAL, type EventQueue } from '../../application/index.js';

/** Outcome of handing one event to the sink. */
export type DeliveryResult =
  | { readonly status: 'delivered' }
  | { readonly status: 'rate_limited'; readonly retryAfterSeconds: number }
  | { readonly status: 'failed'; readonly error: Error };

/** Sink boundary: moves one event downstream. */
export type Deliver = (event: LogEvent) => Promise<DeliveryResult>;

/**
 * What to do with a failed delivery.
 *
 * - `continue`: log it, count the event as handled, wait the failure cooldown.
 * - `abort`: `run()` rejects with SinkDeliveryFailedError.
 *
 * Neither policy resubmits the event.
 */
export type FailurePolicy = 'continue' | 'abort';

export type DispatcherState = 'idle' | 'delivering' | 'waiting' | 'stopped';

export interface DispatcherStatus {
  readonly state: DispatcherState;
  readonly delivered: number;
  readonly rateLimited: number;
  readonly failed: number;
  readonly retryAfterSeconds: number;
  readonly lastError: string | null;
  readonly queued: number;
}

export interface DispatcherOptions {
  queue: EventQueue<LogEvent>;
  deliver: Deliver;
  log: Logger;
  minPostDelaySeconds?: number;
  failurePolicy?: FailurePolicy;
  failureCooldownSeconds?: number;
  /** Injectable for tests; defaults to a timer. */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_MIN_POST_DELAY_SECONDS = 6;
export const DEFAULT_FAILURE_COOLDOWN_SECONDS = 120;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sole consumer of the event queue.
 *
 * Delivers one event at a time, then waits
 * `max(retryAfterSeconds, minPostDelaySeconds)` before pulling the next.
 * The wait applies after every attempt, delivered or not, and is the
 * only throttle; producers keep enqueueing while it runs.
 */
export class Dispatcher {
  private readonly queue: EventQueue<LogEvent>;
  private readonly deliver: Deliver;
  private readonly log: Logger;
  private readonly minPostDelaySeconds: number;
  private readonly failurePolicy: FailurePolicy;
  private readonly failureCooldownSeconds: number;
  private readonly sleep: (ms: number) => Promise<void>;

  private state: DispatcherState = 'idle';
  private running = false;
  private stopRequested = false;
  private retryAfterSeconds = 0;
  private delivered = 0;
  private rateLimited = 0;
  private failed = 0;
  private lastError: string | null = null;

  constructor(opts: DispatcherOptions) {
    this.queue = opts.queue;
    this.deliver = opts.deliver;
    this.log = opts.log;
    this.minPostDelaySeconds = opts.minPostDelaySeconds ?? DEFAULT_MIN_POST_DELAY_SECONDS;
    this.failurePolicy = opts.failurePolicy ?? 'continue';
    this.failureCooldownSeconds = opts.failureCooldownSeconds ?? DEFAULT_FAILURE_COOLDOWN_SECONDS;
    this.sleep = opts.sleep ?? sleep;
  }

  /**
   * Runs the dispatch loop until the stop signal is dequeued.
   *
   * Events queued ahead of the stop signal are still delivered. Rejects
   * only under the `abort` failure policy.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Dispatcher is already running');
    }
    this.running = true;
    this.log.info(
      { minPostDelaySeconds: this.minPostDelaySeconds, failurePolicy: this.failurePolicy },
      'Dispatcher started',
    );

    try {
      for (;;) {
        this.state = 'idle';
        const item = await this.queue.pull();
        if (item === STOP_SIGNAL) break;

        this.state = 'delivering';
        const result = await this.attempt(item);
        this.record(item, result);

        const waitSeconds = Math.max(this.retryAfterSeconds, this.minPostDelaySeconds);
        this.state = 'waiting';
        this.log.debug({ waitSeconds }, 'Waiting before next delivery');
        await this.sleep(waitSeconds * 1000);
      }
    } finally {
      this.state = 'stopped';
      this.running = false;
    }

    this.log.info({ delivered: this.delivered }, 'Dispatcher stopped');
  }

  /** Queues the stop signal; calling it again has no effect. */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.queue.pushStop();
  }

  status(): DispatcherStatus {
    return {
      state: this.state,
      delivered: this.delivered,
      rateLimited: this.rateLimited,
      failed: this.failed,
      retryAfterSeconds: this.retryAfterSeconds,
      lastError: this.lastError,
      queued: this.queue.size,
    };
  }

  private async attempt(event: LogEvent): Promise<DeliveryResult> {
    try {
      return await this.deliver(event);
    } catch (err: unknown) {
      return {
        status: 'failed',
        error: err instanceof Error ? err : new Error(String(err)),
      };
    }
  }

  private record(event: LogEvent, result: DeliveryResult): void {
    switch (result.status) {
      case 'delivered':
        this.delivered++;
        this.retryAfterSeconds = 0;
        this.log.debug({ source: event.source, timestamp: event.timestamp }, 'Event delivered');
        return;

      case 'rate_limited':
        this.rateLimited++;
        this.retryAfterSeconds = result.retryAfterSeconds;
        this.log.warn(
          { retryAfterSeconds: result.retryAfterSeconds, timestamp: event.timestamp },
          'Sink rate limited delivery',
        );
        return;

      case 'failed':
        this.failed++;
        this.lastError = result.error.message;
        if (this.failurePolicy === 'abort') {
          this.log.error({ err: result.error, timestamp: event.timestamp }, 'Delivery failed, aborting');
          throw result.error instanceof SinkDeliveryFailedError
            ? result.error
            : new SinkDeliveryFailedError(result.error.message, undefined, { cause: result.error });
        }
        this.retryAfterSeconds = this.failureCooldownSeconds;
        this.log.warn(
          { err: result.error, timestamp: event.timestamp, cooldownSeconds: this.failureCooldownSeconds },
          'Delivery failed, continuing after cooldown',
        );
        return;
    }
  }
}
