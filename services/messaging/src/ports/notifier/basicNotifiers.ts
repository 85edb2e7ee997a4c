import type { Logger } from '../../observability/logging';
import type { Notifier } from './notifierPort';

export const createNoopNotifier = (): Notifier => ({
  notify() {
    return;
  }
});

export const createLoggingNotifier = (logger: Logger): Notifier => ({
  notify(userId, event) {
    switch (event.kind) {
      case 'MessageCreated':
        logger.info({ userId, messageId: event.message.id, applicationId: event.message.applicationId }, 'message_created');
        return;
      case 'MessagesDeleted':
        logger.info({ userId, messageIds: event.messages.map(message => message.id) }, 'messages_deleted');
        return;
    }
  }
});
