import type { NotificationEvent } from '../../domain/types/event.types';
import type { Message, MessagePage } from '../../domain/types/message.types';
import type { ExternalMessage, PagedMessagesResponse } from './schemas/messages';

export const toExternalMessage = (message: Message): ExternalMessage => ({
  id: message.id,
  appid: message.applicationId,
  message: message.message,
  title: message.title,
  priority: message.priority,
  ...(message.extras ? { extras: message.extras } : {}),
  date: message.createdAt
});

export const toExternalMessages = (messages: Message[]): ExternalMessage[] => messages.map(toExternalMessage);

// credentials accepted in the query string never travel into a rendered link
const CREDENTIAL_PARAMS = ['access_token', 'token'];

/**
 * Copies the request URL and overwrites its paging parameters, so the
 * result can be followed as-is to fetch the following page.
 */
export const buildNextUrl = (requestUrl: string | URL, limit: number, since: number): string => {
  const url = new URL(requestUrl);
  for (const name of CREDENTIAL_PARAMS) url.searchParams.delete(name);
  url.searchParams.set('limit', String(limit));
  url.searchParams.set('since', String(since));
  return url.toString();
};

export const mapPagedMessagesResponse = (page: MessagePage, requestUrl: string | URL): PagedMessagesResponse => ({
  messages: toExternalMessages(page.messages),
  paging: {
    size: page.paging.size,
    limit: page.paging.limit,
    since: page.paging.since,
    ...(page.paging.next === undefined
      ? {}
      : { next: buildNextUrl(requestUrl, page.paging.limit, page.paging.next) })
  }
});

export type StreamFrame =
  | { event: 'message'; message: ExternalMessage }
  | { event: 'messages_deleted'; messages: ExternalMessage[] };

export const toStreamFrame = (event: NotificationEvent): StreamFrame => {
  switch (event.kind) {
    case 'MessageCreated':
      return { event: 'message', message: toExternalMessage(event.message) };
    case 'MessagesDeleted':
      return { event: 'messages_deleted', messages: toExternalMessages(event.messages) };
  }
};
