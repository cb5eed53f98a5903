import { Migration } from './migration-interface.js';
import initialSchema from './001_initial_schema.js';
import incidentContext from './002_incident_context.js';
import chats from './003_chats.js';

export const migrations: Migration[] = [initialSchema, incidentContext, chats];
