import { NotifierError, UnauthorizedError } from '../../domain/errors';
import { messageCreated, messagesDeleted, type NotificationEvent } from '../../domain/types/event.types';
import type {
  ApplicationId,
  CreateMessageInput,
  Message,
  MessageId,
  MessagePage,
  NewMessage,
  PagingParams,
  UserId
} from '../../domain/types/message.types';
import type { Logger } from '../../observability/logging';
import type { MessagingMetrics } from '../../observability/metrics';
import type { MessageRepository } from '../../ports/messages/messageRepository';
import type { Notifier } from '../../ports/notifier/notifierPort';
import { createAuthorizationGuard, type AuthorizationGuard } from './authorizationGuard';
import { fetchPage } from './pagination';

/**
 * `notify-first` announces the snapshot before the rows are removed, so
 * listeners hear about a deletion even when the delete call fails.
 */
export type DeletionOrder = 'notify-first' | 'delete-first';

export type DeletionScope = 'message' | 'application' | 'user';

export type MessageServiceDeps = {
  repository: MessageRepository;
  notifier: Notifier;
  guard?: AuthorizationGuard;
  deletionOrder?: DeletionOrder;
  logger?: Logger;
  metrics?: Pick<MessagingMetrics, 'messagesCreatedTotal' | 'messagesDeletedTotal' | 'notificationsTotal'>;
};

export type MessageService = {
  listMessages(userId: UserId, paging: PagingParams): Promise<MessagePage>;
  listApplicationMessages(userId: UserId, applicationId: ApplicationId, paging: PagingParams): Promise<MessagePage>;
  createMessage(applicationToken: string, input: CreateMessageInput): Promise<Message>;
  deleteMessage(userId: UserId, messageId: MessageId): Promise<void>;
  deleteApplicationMessages(userId: UserId, applicationId: ApplicationId): Promise<void>;
  deleteAllMessages(userId: UserId): Promise<void>;
};

export const createMessageService = ({
  repository,
  notifier,
  guard = createAuthorizationGuard({ repository }),
  deletionOrder = 'notify-first',
  logger,
  metrics
}: MessageServiceDeps): MessageService => {
  const dispatch = (userId: UserId, event: NotificationEvent) => {
    try {
      notifier.notify(userId, event);
      metrics?.notificationsTotal.labels({ kind: event.kind, outcome: 'sent' }).inc();
    } catch (error) {
      metrics?.notificationsTotal.labels({ kind: event.kind, outcome: 'failed' }).inc();
      logger?.warn({ err: new NotifierError(event.kind, error), userId }, 'notification_failed');
    }
  };

  const announceDeletion = (userId: UserId, snapshot: Message[]) => {
    dispatch(userId, messagesDeleted(snapshot));
  };

  const removeWithNotice = async (
    userId: UserId,
    scope: DeletionScope,
    snapshot: Message[],
    remove: () => Promise<void>
  ) => {
    const runRemove = async () => {
      try {
        await remove();
      } catch (error) {
        // with notify-first the event is already out and stays out
        logger?.error({ err: error, userId, scope, count: snapshot.length, deletionOrder }, 'message_delete_failed');
        throw error;
      }
    };

    if (deletionOrder === 'notify-first') {
      announceDeletion(userId, snapshot);
      await runRemove();
    } else {
      await runRemove();
      announceDeletion(userId, snapshot);
    }
    metrics?.messagesDeletedTotal.labels({ scope }).inc(snapshot.length);
  };

  return {
    async listMessages(userId, paging) {
      return fetchPage((limit, since) => repository.getMessagesByUserSince(userId, limit, since), paging);
    },

    async listApplicationMessages(userId, applicationId, paging) {
      await guard.requireOwnedApplication(userId, applicationId);
      return fetchPage(
        (limit, since) => repository.getMessagesByApplicationSince(applicationId, limit, since),
        paging
      );
    },

    async createMessage(applicationToken, input) {
      const application = await repository.getApplicationByToken(applicationToken);
      if (!application) {
        throw new UnauthorizedError();
      }

      const draft: NewMessage = {
        applicationId: application.id,
        title: input.title?.trim() ? input.title : application.name,
        message: input.message,
        priority: input.priority ?? application.defaultPriority,
        ...(input.extras ? { extras: input.extras } : {})
      };

      // a failed insert throws here, before anyone is told about the message
      const stored = await repository.createMessage(draft);
      metrics?.messagesCreatedTotal.inc();

      dispatch(application.userId, messageCreated(stored));
      return stored;
    },

    async deleteMessage(userId, messageId) {
      const { message } = await guard.requireOwnedMessage(userId, messageId);
      await removeWithNotice(userId, 'message', [message], () => repository.deleteMessageById(messageId));
    },

    async deleteApplicationMessages(userId, applicationId) {
      await guard.requireOwnedApplication(userId, applicationId);
      const snapshot = await repository.getMessagesByApplication(applicationId);
      await removeWithNotice(userId, 'application', snapshot, () =>
        repository.deleteMessagesByApplication(applicationId)
      );
    },

    async deleteAllMessages(userId) {
      const snapshot = await repository.getMessagesByUser(userId);
      await removeWithNotice(userId, 'user', snapshot, () => repository.deleteMessagesByUser(userId));
    }
  };
};
