import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { LogEvent } from './domain/index.js';
import { EventQueue } from './application/index.js';
import {
  Dispatcher,
  LogCollector,
  createChokidarWatcherFactory,
  createWebhookSink,
  type Deliver,
  type DirectoryWatcherFactory,
  type RelayConfig,
} from './infrastructure/index.js';
import { buildStatusServer } from './interfaces/http/index.js';

export interface RelayOptions {
  config: RelayConfig;
  log: Logger;
  /** Called once per fatal failure of a tailer or the dispatcher. */
  onFatal: (err: Error) => void;
  /** Overrides for tests; default to the webhook sink, chokidar and timers. */
  deliver?: Deliver;
  createWatcher?: DirectoryWatcherFactory;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wires collector, queue, dispatcher and the optional status server.
 *
 * start():
 * 1) replay + start tailers (replayed events queued first)
 * 2) start the dispatch loop
 * 3) listen() on the status port when configured
 */
export class Relay {
  readonly queue = new EventQueue<LogEvent>();
  readonly dispatcher: Dispatcher;
  readonly collector: LogCollector;

  private readonly config: RelayConfig;
  private readonly log: Logger;
  private readonly onFatal: (err: Error) => void;
  private statusServer: FastifyInstance | null = null;
  private dispatching: Promise<void> | null = null;

  constructor(opts: RelayOptions) {
    this.config = opts.config;
    this.log = opts.log;
    this.onFatal = opts.onFatal;

    this.dispatcher = new Dispatcher({
      queue: this.queue,
      deliver: opts.deliver ?? createWebhookSink(opts.config.webhook, opts.log),
      log: opts.log.child({ component: 'dispatcher' }),
      minPostDelaySeconds: opts.config.minPostDelaySeconds,
      failurePolicy: opts.config.failurePolicy,
      failureCooldownSeconds: opts.config.failureCooldownSeconds,
      ...(opts.sleep ? { sleep: opts.sleep } : {}),
    });

    this.collector = new LogCollector({
      directories: [
        { source: 'server', directory: opts.config.serverLogsDir },
        { source: 'accounting', directory: opts.config.accountingLogsDir },
      ],
      queue: this.queue,
      log: opts.log,
      replayFiles: opts.config.replayFiles,
      createWatcher: opts.createWatcher ?? createChokidarWatcherFactory(opts.config.watch),
      onFatal: opts.onFatal,
    });
  }

  async start(): Promise<void> {
    const replayed = await this.collector.start();
    this.log.info({ replayed }, 'Collector started');

    this.dispatching = this.dispatcher.run().catch((err: unknown) => {
      this.onFatal(err instanceof Error ? err : new Error(String(err)));
    });

    if (this.config.status) {
      const server = await buildStatusServer(this.log, {
        dispatcherStatus: () => this.dispatcher.status(),
        tailers: () => this.collector.snapshot(),
      });
      this.statusServer = server;
      await server.listen({ host: this.config.status.host, port: this.config.status.port });
    }
  }

  /**
   * Stops the tailers and queues the dispatcher's stop signal. Events
   * already queued are still delivered; `finished()` settles when the
   * dispatch loop has exited.
   */
  async stop(): Promise<void> {
    await this.collector.stop();
    this.dispatcher.stop();
    if (this.statusServer) {
      const server = this.statusServer;
      this.statusServer = null;
      await server.close();
    }
  }

  finished(): Promise<void> {
    return this.dispatching ?? Promise.resolve();
  }
}
