import type { Message, MessageId, UserId } from '../../../domain/types/message.types';
import type { MessageRepository } from '../messageRepository';
import { createInMemoryMessageStore, type InMemoryMessageStore } from './store';

export type InMemoryMessageRepositoryDeps = {
  store?: InMemoryMessageStore;
  now?: () => Date;
};

export const createInMemoryMessageRepository = (
  deps: InMemoryMessageRepositoryDeps = {}
): MessageRepository => {
  const { store = createInMemoryMessageStore(), now = () => new Date() } = deps;
  const { applications, messages } = store;

  const applicationIdsOf = (userId: UserId) =>
    new Set(
      Array.from(applications.values())
        .filter(application => application.userId === userId)
        .map(application => application.id)
    );

  const select = (predicate: (message: Message) => boolean): Message[] =>
    sortNewestFirst(Array.from(messages.values()).filter(predicate));

  const removeWhere = (predicate: (message: Message) => boolean) => {
    for (const message of Array.from(messages.values())) {
      if (predicate(message)) messages.delete(message.id);
    }
  };

  return {
    async getMessagesByApplication(applicationId) {
      return select(message => message.applicationId === applicationId);
    },

    async getMessagesByApplicationSince(applicationId, limit, since) {
      return select(message => message.applicationId === applicationId && isBefore(message, since)).slice(0, limit);
    },

    async getMessagesByUser(userId) {
      const owned = applicationIdsOf(userId);
      return select(message => owned.has(message.applicationId));
    },

    async getMessagesByUserSince(userId, limit, since) {
      const owned = applicationIdsOf(userId);
      return select(message => owned.has(message.applicationId) && isBefore(message, since)).slice(0, limit);
    },

    async getMessageById(id) {
      return messages.get(id) ?? null;
    },

    async getApplicationById(id) {
      return applications.get(id) ?? null;
    },

    async getApplicationByToken(token) {
      return Array.from(applications.values()).find(application => application.token === token) ?? null;
    },

    async deleteMessageById(id) {
      messages.delete(id);
    },

    async deleteMessagesByApplication(applicationId) {
      removeWhere(message => message.applicationId === applicationId);
    },

    async deleteMessagesByUser(userId) {
      const owned = applicationIdsOf(userId);
      removeWhere(message => owned.has(message.applicationId));
    },

    async createMessage(draft) {
      store.lastMessageId += 1;
      const message: Message = {
        ...draft,
        id: store.lastMessageId,
        createdAt: now().toISOString()
      };
      messages.set(message.id, message);
      return message;
    }
  };
};

const isBefore = (message: Message, since: MessageId) => since === 0 || message.id < since;

const sortNewestFirst = (messages: Message[]): Message[] =>
  [...messages].sort((left, right) => right.id - left.id);
