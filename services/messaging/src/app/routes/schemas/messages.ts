import { z } from 'zod';
import { CreateMessageSchema, MessageExtrasSchema, PagingParamsSchema } from '../../../domain/types/message.types';

const IdSchema = z.coerce.number().int().positive().max(Number.MAX_SAFE_INTEGER);

export const MessageIdParamsSchema = z.object({ id: IdSchema });

export const ApplicationIdParamsSchema = z.object({ id: IdSchema });

export const ListMessagesQuerySchema = PagingParamsSchema;

export const CreateMessageBodySchema = CreateMessageSchema;

export const ExternalMessageSchema = z.object({
  id: z.number().int().positive(),
  appid: z.number().int().positive(),
  message: z.string(),
  title: z.string(),
  priority: z.number().int(),
  extras: MessageExtrasSchema.optional(),
  date: z.string().datetime()
});

export type ExternalMessage = z.infer<typeof ExternalMessageSchema>;

export const PagedMessagesResponseSchema = z.object({
  messages: z.array(ExternalMessageSchema),
  paging: z.object({
    size: z.number().int().nonnegative(),
    limit: z.number().int().positive(),
    since: z.number().int().nonnegative(),
    next: z.string().url().optional()
  })
});

export type PagedMessagesResponse = z.infer<typeof PagedMessagesResponseSchema>;
