export { NotificationService } from './NotificationService.js';
export { TelegramClient, extractRetryAfterMs } from './TelegramClient.js';
export {
  formatNotification,
  formatSignalMessage,
  formatErrorMessage,
  formatStartupMessage,
  formatShutdownMessage,
  formatTime,
  escapeHtml,
} from './formatter.js';
export type {
  NotificationServiceConfig,
  EngineNotification,
  NotificationSink,
  MessageTransport,
  NotificationEvents,
} from './types.js';
