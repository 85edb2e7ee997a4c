import { ApplicationNotFoundError, MessageNotFoundError } from '../../domain/errors';
import type {
  Application,
  ApplicationId,
  Message,
  MessageId,
  UserId
} from '../../domain/types/message.types';
import type { Logger } from '../../observability/logging';
import type { MessageRepository } from '../../ports/messages/messageRepository';

export type AuthorizationGuardDeps = {
  repository: Pick<MessageRepository, 'getApplicationById' | 'getMessageById'>;
  logger?: Logger;
};

export type OwnedMessage = {
  message: Message;
  application: Application;
};

export type AuthorizationGuard = {
  requireOwnedApplication(userId: UserId, applicationId: ApplicationId): Promise<Application>;
  requireOwnedMessage(userId: UserId, messageId: MessageId): Promise<OwnedMessage>;
};

export const isOwnedBy = (application: Application | null, userId: UserId): application is Application =>
  application !== null && application.userId === userId;

/**
 * Ownership checks for user-scoped operations. A target that does not
 * exist and one that belongs to another user raise the same not-found
 * error.
 */
export const createAuthorizationGuard = ({ repository, logger }: AuthorizationGuardDeps): AuthorizationGuard => {
  const deny = (reason: 'missing' | 'foreign', context: Record<string, unknown>) => {
    logger?.debug({ reason, ...context }, 'ownership_denied');
  };

  return {
    async requireOwnedApplication(userId, applicationId) {
      const application = await repository.getApplicationById(applicationId);
      if (!isOwnedBy(application, userId)) {
        deny(application ? 'foreign' : 'missing', { userId, applicationId });
        throw new ApplicationNotFoundError(applicationId);
      }
      return application;
    },

    async requireOwnedMessage(userId, messageId) {
      const message = await repository.getMessageById(messageId);
      if (!message) {
        deny('missing', { userId, messageId });
        throw new MessageNotFoundError(messageId);
      }
      const application = await repository.getApplicationById(message.applicationId);
      if (!isOwnedBy(application, userId)) {
        deny(application ? 'foreign' : 'missing', { userId, messageId, applicationId: message.applicationId });
        throw new MessageNotFoundError(messageId);
      }
      return { message, application };
    }
  };
};
