import { StorageError } from '../../../domain/errors';
import type {
  Application,
  ApplicationId,
  Message,
  MessageExtras,
  MessageId,
  UserId
} from '../../../domain/types/message.types';
import type { SqlClient } from '../../shared/sql';
import type { MessageRepository } from '../messageRepository';

export type PostgresMessageRepositoryDeps = {
  sql: SqlClient;
};

export const createPostgresMessageRepository = ({ sql }: PostgresMessageRepositoryDeps): MessageRepository => {
  const run = async <T>(operation: string, text: string, params: unknown[] = []): Promise<T[]> => {
    try {
      const result = await sql.query<T>(text, params);
      return result.rows;
    } catch (error) {
      throw new StorageError(operation, error);
    }
  };

  const listMessages = async (operation: string, scope: MessageScope, page?: PageWindow) => {
    const { sqlString, params } = buildMessageQuery(scope, page);
    const rows = await run<MessageRow>(operation, sqlString, params);
    return rows.map(mapRowToMessage);
  };

  return {
    async getMessagesByApplication(applicationId) {
      return listMessages('getMessagesByApplication', { kind: 'application', applicationId });
    },

    async getMessagesByApplicationSince(applicationId, limit, since) {
      return listMessages('getMessagesByApplicationSince', { kind: 'application', applicationId }, { limit, since });
    },

    async getMessagesByUser(userId) {
      return listMessages('getMessagesByUser', { kind: 'user', userId });
    },

    async getMessagesByUserSince(userId, limit, since) {
      return listMessages('getMessagesByUserSince', { kind: 'user', userId }, { limit, since });
    },

    async getMessageById(id) {
      const rows = await run<MessageRow>(
        'getMessageById',
        `
        select m.*
        from messaging.messages m
        where m.id = $1
        limit 1
      `,
        [id]
      );
      return rows[0] ? mapRowToMessage(rows[0]) : null;
    },

    async getApplicationById(id) {
      const rows = await run<ApplicationRow>(
        'getApplicationById',
        `
        select *
        from messaging.applications
        where id = $1
        limit 1
      `,
        [id]
      );
      return rows[0] ? mapRowToApplication(rows[0]) : null;
    },

    async getApplicationByToken(token) {
      const rows = await run<ApplicationRow>(
        'getApplicationByToken',
        `
        select *
        from messaging.applications
        where token = $1
        limit 1
      `,
        [token]
      );
      return rows[0] ? mapRowToApplication(rows[0]) : null;
    },

    async deleteMessageById(id) {
      await run('deleteMessageById', `delete from messaging.messages where id = $1`, [id]);
    },

    async deleteMessagesByApplication(applicationId) {
      await run(
        'deleteMessagesByApplication',
        `delete from messaging.messages where application_id = $1`,
        [applicationId]
      );
    },

    async deleteMessagesByUser(userId) {
      await run(
        'deleteMessagesByUser',
        `
        delete from messaging.messages
        where application_id in (select id from messaging.applications where user_id = $1)
      `,
        [userId]
      );
    },

    async createMessage(draft) {
      const rows = await run<MessageRow>(
        'createMessage',
        `
        insert into messaging.messages (application_id, title, message, priority, extras)
        values ($1, $2, $3, $4, $5)
        returning *
      `,
        [
          draft.applicationId,
          draft.title,
          draft.message,
          draft.priority,
          draft.extras === undefined ? null : JSON.stringify(draft.extras)
        ]
      );
      if (!rows[0]) {
        throw new StorageError('createMessage', new Error('insert returned no row'));
      }
      return mapRowToMessage(rows[0]);
    }
  };
};

type MessageScope =
  | { kind: 'application'; applicationId: ApplicationId }
  | { kind: 'user'; userId: UserId };

type PageWindow = { limit: number; since: MessageId };

const buildMessageQuery = (scope: MessageScope, page?: PageWindow) => {
  const where: string[] = [];
  const params: unknown[] = [];

  if (scope.kind === 'application') {
    params.push(scope.applicationId);
    where.push(`m.application_id = $${params.length}`);
  } else {
    params.push(scope.userId);
    where.push(`m.application_id in (select id from messaging.applications where user_id = $${params.length})`);
  }

  if (page && page.since > 0) {
    params.push(page.since);
    where.push(`m.id < $${params.length}`);
  }

  const limitClause = buildLimitClause(page, params);

  const sqlString = `
    select m.*
    from messaging.messages m
    where ${where.join(' and ')}
    order by m.id desc
    ${limitClause}
  `;

  return { sqlString, params };
};

const buildLimitClause = (page: PageWindow | undefined, params: unknown[]) => {
  if (!page) return '';
  params.push(page.limit);
  return `limit $${params.length}`;
};

// bigint columns arrive as strings from pg
type MessageRow = {
  id: string | number;
  application_id: string | number;
  title: string;
  message: string;
  priority: number;
  extras: MessageExtras | null;
  created_at: Date | string;
};

type ApplicationRow = {
  id: string | number;
  user_id: string;
  name: string;
  token: string;
  description: string | null;
  default_priority: number;
};

const mapRowToMessage = (row: MessageRow): Message => ({
  id: Number(row.id),
  applicationId: Number(row.application_id),
  title: row.title,
  message: row.message,
  priority: row.priority,
  extras: row.extras ?? undefined,
  createdAt: new Date(row.created_at).toISOString()
});

const mapRowToApplication = (row: ApplicationRow): Application => ({
  id: Number(row.id),
  userId: row.user_id,
  name: row.name,
  token: row.token,
  description: row.description ?? undefined,
  defaultPriority: row.default_priority
});
