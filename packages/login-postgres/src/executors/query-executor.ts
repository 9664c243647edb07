export type QueryRow = Record<string, unknown>;

export interface QueryResult {
  readonly rows: ReadonlyArray<QueryRow>;
}

export interface QueryExecutor {
  query(sql: string, params?: ReadonlyArray<unknown>): Promise<QueryResult>;
}
