export { loadRelayConfig, relayEnvSchema, ConfigError, DEFAULT_TORQUE_HOME } from './config/relay-config.js';
export type { RelayConfig, RelayEnv } from './config/relay-config.js';
export { Dispatcher, createWebhookSink, formatSlackMessage } from './notifications/index.js';
export type { Deliver, DeliveryResult, DispatcherStatus, FailurePolicy } from './notifications/index.js';
export { LogCollector, DirectoryTailer, createChokidarWatcherFactory, replayDirectory } from './tailer/index.js';
export type {
  DirectoryWatcher,
  DirectoryWatcherFactory,
  DirectoryChange,
  TailerSnapshot,
  TailerHandoff,
} from './tailer/index.js';
