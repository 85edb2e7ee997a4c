export type QueryResult<T = unknown> = {
  rows: T[];
  rowCount?: number | null;
};

export type SqlClient = {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
};
