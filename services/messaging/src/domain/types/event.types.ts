import type { Message } from './message.types';

/**
 * Payload handed to live listeners. Creation carries the stored message,
 * deletion carries the snapshot taken before the rows were removed.
 */
export type NotificationEvent =
  | { kind: 'MessageCreated'; message: Message }
  | { kind: 'MessagesDeleted'; messages: Message[] };

export const messageCreated = (message: Message): NotificationEvent => ({
  kind: 'MessageCreated',
  message
});

export const messagesDeleted = (messages: Message[]): NotificationEvent => ({
  kind: 'MessagesDeleted',
  messages
});
