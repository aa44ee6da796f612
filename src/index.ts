import pino from 'pino';
import { loadRelayConfig } from './infrastructure/index.js';
import { Relay } from './relay.js';

/**
 * Relay process: replays recent TORQUE server and accounting logs,
 * tails them live and posts every event to the configured webhook.
 *
 * Any fatal failure (watch lost, concurrent writers, aborted delivery)
 * stops everything and exits 1.
 */
const SHUTDOWN_GRACE_MS = 3000;

const log = pino();

let relay: Relay | null = null;
let shuttingDown = false;

function shutdown(code: number): void {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info('Shutting down relay...');

  // Give queued deliveries a moment, then force exit
  const timer = setTimeout(() => process.exit(code), SHUTDOWN_GRACE_MS);

  const current = relay;
  if (!current) {
    process.exit(code);
  }

  current
    .stop()
    .then(() => current.finished())
    .then(() => {
      clearTimeout(timer);
      process.exit(code);
    })
    .catch((err: unknown) => {
      log.error({ err }, 'Error during shutdown');
    });
}

async function main(): Promise<void> {
  const config = loadRelayConfig();
  log.level = config.logLevel;

  relay = new Relay({
    config,
    log,
    onFatal: (err) => {
      log.fatal({ err }, 'Fatal relay failure');
      shutdown(1);
    },
  });

  await relay.start();
}

process.on('SIGINT', () => shutdown(0));
process.on('SIGTERM', () => shutdown(0));

main().catch((err: unknown) => {
  log.fatal({ err }, 'Relay failed to start');
  shutdown(1);
});
