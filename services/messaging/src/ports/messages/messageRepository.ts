import type {
  Application,
  ApplicationId,
  Message,
  MessageId,
  NewMessage,
  UserId
} from '../../domain/types/message.types';

/**
 * Persistence contract for messages and the applications that own them.
 *
 * Adapters raise `StorageError` on any I/O or constraint failure. A missing
 * row is `null` (or an empty list), never an error. `since = 0` means no
 * upper id bound; otherwise only ids strictly below `since` are returned,
 * newest first.
 */
export interface MessageRepository {
  getMessagesByApplication(applicationId: ApplicationId): Promise<Message[]>;
  getMessagesByApplicationSince(applicationId: ApplicationId, limit: number, since: MessageId): Promise<Message[]>;
  getMessagesByUser(userId: UserId): Promise<Message[]>;
  getMessagesByUserSince(userId: UserId, limit: number, since: MessageId): Promise<Message[]>;
  getMessageById(id: MessageId): Promise<Message | null>;
  getApplicationById(id: ApplicationId): Promise<Application | null>;
  getApplicationByToken(token: string): Promise<Application | null>;
  deleteMessageById(id: MessageId): Promise<void>;
  deleteMessagesByApplication(applicationId: ApplicationId): Promise<void>;
  deleteMessagesByUser(userId: UserId): Promise<void>;
  createMessage(draft: NewMessage): Promise<Message>;
}
