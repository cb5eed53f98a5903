import { Migration } from './migration-interface.js';

const migration: Migration = {
  id: 3,
  name: '003_chats',
  description: 'Store chat transcripts recorded against debug instances',

  async up(db) {
    await db.run(`
      CREATE TABLE IF NOT EXISTS chats (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        correlation_id TEXT NOT NULL,
        transcript TEXT NOT NULL,
        created_at TEXT NOT NULL
      )
    `);

    await db.run(`CREATE INDEX IF NOT EXISTS idx_chats_correlation_id ON chats(correlation_id)`);
  },
};

export default migration;
