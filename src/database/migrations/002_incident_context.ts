import { Migration } from './migration-interface.js';

const migration: Migration = {
  id: 2,
  name: '002_incident_context',
  description: 'Keep the incident a debug instance was created for',

  async up(db) {
    await db.run(`ALTER TABLE instances ADD COLUMN incident TEXT`);
  },
};

export default migration;
