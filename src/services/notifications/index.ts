// Notifications Module - Main exports

export { GatewayNotifier, toPayload } from './gateway-notifier.js';
export type { GatewayNotifierOptions } from './gateway-notifier.js';
export { GatewayProgressReporter, describeProgressEvent } from './progress-reporter.js';
export type { ProgressTarget } from './progress-reporter.js';
export { silentProgress } from './types.js';
export type { Notifier, NotificationStatus, ProgressEvent, ProgressPayload, ProgressSink, SessionProgress } from './types.js';
