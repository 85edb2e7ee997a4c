import { ValidationError } from '../../domain/errors';
import {
  MAX_PAGE_LIMIT,
  type Message,
  type MessageId,
  type MessagePage,
  type PagingParams
} from '../../domain/types/message.types';

/**
 * Repository query for one page window: up to `limit` rows with ids below
 * `since` (no bound when `since` is 0), newest first.
 */
export type PageSource = (limit: number, since: MessageId) => Promise<Message[]>;

export const assertPagingParams = ({ limit, since }: PagingParams) => {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) {
    throw new ValidationError('limit', `must be an integer between 1 and ${MAX_PAGE_LIMIT}`);
  }
  if (!Number.isInteger(since) || since < 0 || since > Number.MAX_SAFE_INTEGER) {
    throw new ValidationError('since', 'must be a non-negative safe integer');
  }
};

/**
 * Turns the rows fetched with one lookahead row into a page. More than
 * `limit` rows means a further page exists: the page keeps the first
 * `limit` rows and the id of the last kept row becomes the next cursor.
 */
export const buildPage = (rows: Message[], { limit }: Pick<PagingParams, 'limit'>): MessagePage => {
  if (rows.length <= limit) {
    return { messages: rows, paging: { size: rows.length, limit, since: 0 } };
  }

  const messages = rows.slice(0, limit);
  const cursor = messages[messages.length - 1].id;
  return {
    messages,
    paging: { size: messages.length, limit, since: cursor, next: cursor }
  };
};

export const fetchPage = async (source: PageSource, params: PagingParams): Promise<MessagePage> => {
  assertPagingParams(params);
  // the extra row only tells whether another page exists; buildPage drops it
  const rows = await source(params.limit + 1, params.since);
  return buildPage(rows, params);
};
