/**
 * The subset of the database a migration needs.
 */
export interface SqlExecutor {
  run(sql: string, params?: unknown[]): Promise<{ changes: number; lastID: number }>;
}

export interface Migration {
  id: number;
  name: string;
  description: string;
  up: (db: SqlExecutor) => Promise<void>;
}
