export type { Notifier } from './notifierPort';
export { createLoggingNotifier, createNoopNotifier } from './basicNotifiers';
