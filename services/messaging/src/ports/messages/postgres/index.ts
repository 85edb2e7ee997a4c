export { createPostgresMessageRepository, type PostgresMessageRepositoryDeps } from './messageRepositoryAdapter';
export { createPgSqlClient, migrate } from './pgClient';
