import { z } from 'zod/v4';
import { Migration } from './migrations/migration-interface.js';
import { migrations as defaultMigrations } from './migrations/index.js';
import type { DatabaseService } from './database.js';

const appliedRowSchema = z.object({ id: z.number().int() });

export class MigrationRunner {
  constructor(
    private readonly db: DatabaseService,
    private readonly migrations: Migration[] = defaultMigrations
  ) {}

  async init(): Promise<void> {
    await this.db.run(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT NOT NULL,
        applied_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        UNIQUE(id)
      )
    `);
  }

  async getAppliedMigrations(): Promise<number[]> {
    const rows = await this.db.all('SELECT id FROM migrations ORDER BY id ASC');
    return rows.map((row) => appliedRowSchema.parse(row).id);
  }

  getAvailableMigrations(): Migration[] {
    return [...this.migrations].sort((a, b) => a.id - b.id);
  }

  async getPendingMigrations(): Promise<Migration[]> {
    const applied = await this.getAppliedMigrations();
    return this.getAvailableMigrations().filter((migration) => !applied.includes(migration.id));
  }

  async runMigration(migration: Migration): Promise<void> {
    console.log(`[Database] Running migration ${migration.id}: ${migration.name}`);

    await this.db.run('BEGIN TRANSACTION');
    try {
      await migration.up(this.db);
      await this.db.run('INSERT INTO migrations (id, name, description) VALUES (?, ?, ?)', [
        migration.id,
        migration.name,
        migration.description,
      ]);
      await this.db.run('COMMIT');
    } catch (error) {
      await this.db.run('ROLLBACK');
      console.error(`[Database] Migration ${migration.id} failed:`, error);
      throw error;
    }
  }

  async runPendingMigrations(): Promise<number> {
    const pending = await this.getPendingMigrations();
    for (const migration of pending) {
      await this.runMigration(migration);
    }
    return pending.length;
  }
}
