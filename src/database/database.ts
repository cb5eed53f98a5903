import sqlite3 from 'sqlite3';
import { MigrationRunner } from './migration-runner.js';
import { SqlExecutor } from './migrations/migration-interface.js';

export class DatabaseService implements SqlExecutor {
  private readonly db: sqlite3.Database;
  private readonly migrationRunner: MigrationRunner;
  private readonly initPromise: Promise<void>;

  constructor(dbPath: string = 'instances.db') {
    this.db = new sqlite3.Database(dbPath);
    this.migrationRunner = new MigrationRunner(this);
    this.initPromise = this.initialize();
    // Failures surface through waitForInit()
    this.initPromise.catch(() => undefined);
  }

  async waitForInit(): Promise<void> {
    return this.initPromise;
  }

  private async initialize(): Promise<void> {
    try {
      await this.migrationRunner.init();
      const applied = await this.migrationRunner.runPendingMigrations();
      console.log(`[Database] Ready (${applied} migration(s) applied)`);
    } catch (error) {
      console.error('[Database] Failed to initialize database:', error);
      throw error;
    }
  }

  getMigrationRunner(): MigrationRunner {
    return this.migrationRunner;
  }

  run(sql: string, params: unknown[] = []): Promise<sqlite3.RunResult> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) {
          reject(err);
        } else {
          resolve(this);
        }
      });
    });
  }

  get(sql: string, params: unknown[] = []): Promise<unknown> {
    return new Promise((resolve, reject) => {
      this.db.get(sql, params, (err: Error | null, row: unknown) => {
        if (err) {
          reject(err);
        } else {
          resolve(row);
        }
      });
    });
  }

  all(sql: string, params: unknown[] = []): Promise<unknown[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: unknown[]) => {
        if (err) {
          reject(err);
        } else {
          resolve(rows);
        }
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}
