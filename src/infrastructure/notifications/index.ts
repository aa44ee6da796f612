export { Dispatcher, DEFAULT_MIN_POST_DELAY_SECONDS, DEFAULT_FAILURE_COOLDOWN_SECONDS } from './dispatcher.js';
export type {
  Deliver,
  DeliveryResult,
  DispatcherOptions,
  DispatcherState,
  DispatcherStatus,
  FailurePolicy,
} from './dispatcher.js';
export {
  createWebhookSink,
  formatSlackMessage,
  escapeSlackText,
  parseRetryAfter,
  accountingColor,
} from './slack.js';
export type { WebhookConfig, SlackMessage, SlackAttachment, AttachmentColor } from './slack.js';
