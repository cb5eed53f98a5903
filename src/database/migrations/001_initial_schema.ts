import { Migration } from './migration-interface.js';

const migration: Migration = {
  id: 1,
  name: '001_initial_schema',
  description: 'Create instances table holding one row per live debug instance',

  async up(db) {
    await db.run(`
      CREATE TABLE IF NOT EXISTS instances (
        correlation_id TEXT PRIMARY KEY,
        source_commit TEXT NOT NULL,
        reference_commit TEXT NOT NULL,
        working_copy_path TEXT NOT NULL,
        branch_name TEXT NOT NULL,
        port INTEGER NOT NULL,
        pid INTEGER,
        status TEXT NOT NULL,
        log_path TEXT,
        pid_file TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT DEFAULT (datetime('now'))
      )
    `);

    await db.run(`CREATE UNIQUE INDEX IF NOT EXISTS idx_instances_port ON instances(port)`);
  },
};

export default migration;
