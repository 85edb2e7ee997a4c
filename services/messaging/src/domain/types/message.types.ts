/**
 * Message domain types and validation schemas
 *
 * Messages are posted by applications and read by the user owning the
 * application. Ids grow strictly with creation order and double as the
 * paging cursor.
 */

import { z } from 'zod';

export type MessageId = number;

export type ApplicationId = number;

/**
 * Users are identified by the subject of their access token
 */
export type UserId = string;

/**
 * ISO 8601 timestamp
 */
export type IsoDateTime = string;

/**
 * Client extras keyed by namespace, e.g. `{ "client::display": { ... } }`.
 * Values are arbitrary JSON.
 */
export const MessageExtrasSchema = z.record(z.unknown());

export type MessageExtras = z.infer<typeof MessageExtrasSchema>;

export type Message = {
  id: MessageId;
  applicationId: ApplicationId;
  title: string;
  message: string;
  priority: number;
  extras?: MessageExtras;
  createdAt: IsoDateTime;
};

/**
 * A message before the repository has assigned its id and timestamp
 */
export type NewMessage = Omit<Message, 'id' | 'createdAt'>;

export type Application = {
  id: ApplicationId;
  userId: UserId;
  name: string;
  token: string;
  description?: string;
  defaultPriority: number;
};

/**
 * Body accepted from an application when it posts a message
 */
export const CreateMessageSchema = z.object({
  message: z.string().min(1),
  title: z.string().optional(),
  priority: z.number().int().optional(),
  extras: MessageExtrasSchema.optional()
});

export type CreateMessageInput = z.infer<typeof CreateMessageSchema>;

export const DEFAULT_PAGE_LIMIT = 100;
export const MAX_PAGE_LIMIT = 200;

export const PagingParamsSchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_LIMIT).default(DEFAULT_PAGE_LIMIT),
  since: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0)
});

export type PagingParams = z.infer<typeof PagingParamsSchema>;

export type Paging = {
  size: number;
  limit: number;
  /** id of the oldest message on this page when a further page exists, else 0 */
  since: MessageId;
  /** cursor to pass as `since` for the next page */
  next?: MessageId;
};

export type MessagePage = {
  messages: Message[];
  paging: Paging;
};
