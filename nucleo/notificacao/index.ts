/**
 * NOTIFICAÇÕES
 *
 * Barrel export: tipos, dispatcher fire-and-forget e sinks.
 */

export { NotificationSeverity, NotificationEvent, NotificationSink } from './NotificationTypes';
export { NotificationDispatcher } from './NotificationDispatcher';
export { EventLogNotificationSink } from './EventLogNotificationSink';
export { LoggerNotificationSink } from './LoggerNotificationSink';
