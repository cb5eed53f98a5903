import { z } from 'zod/v4';
import { Instance, incidentSchema } from '../types.js';
import { errorMessage } from '../errors.js';
import { DatabaseService } from './database.js';

/**
 * Durable record of live instances, read back at startup to recover
 * instances that outlived a previous orchestrator process.
 */
export interface InstanceStore {
  save(instance: Instance): Promise<void>;
  remove(correlationId: string): Promise<void>;
  list(): Promise<Instance[]>;
}

const instanceRowSchema = z.object({
  correlation_id: z.string(),
  source_commit: z.string(),
  reference_commit: z.string(),
  working_copy_path: z.string(),
  branch_name: z.string(),
  port: z.number().int(),
  pid: z.number().int().nullable(),
  status: z.enum(['provisioning', 'running', 'draining', 'terminated']),
  log_path: z.string().nullable(),
  pid_file: z.string().nullable(),
  incident: z.string().nullable(),
  created_at: z.string(),
});

type InstanceRow = z.infer<typeof instanceRowSchema>;

function parseIncident(row: InstanceRow): Instance['incident'] {
  if (!row.incident) return undefined;
  try {
    return incidentSchema.parse(JSON.parse(row.incident));
  } catch (error) {
    console.warn(`[Store] Ignoring unreadable incident of ${row.correlation_id}: ${errorMessage(error)}`);
    return undefined;
  }
}

function fromRow(row: InstanceRow): Instance {
  return {
    correlationId: row.correlation_id,
    sourceCommit: row.source_commit,
    referenceCommit: row.reference_commit,
    workingCopyPath: row.working_copy_path,
    branchName: row.branch_name,
    port: row.port,
    pid: row.pid ?? undefined,
    status: row.status,
    createdAt: new Date(row.created_at),
    logPath: row.log_path ?? undefined,
    pidFile: row.pid_file ?? undefined,
    incident: parseIncident(row),
  };
}

export class SqliteInstanceStore implements InstanceStore {
  constructor(private readonly db: DatabaseService) {}

  async save(instance: Instance): Promise<void> {
    await this.db.run(
      `INSERT OR REPLACE INTO instances
        (correlation_id, source_commit, reference_commit, working_copy_path, branch_name, port, pid, status, log_path, pid_file, incident, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, datetime('now'))`,
      [
        instance.correlationId,
        instance.sourceCommit,
        instance.referenceCommit,
        instance.workingCopyPath,
        instance.branchName,
        instance.port,
        instance.pid ?? null,
        instance.status,
        instance.logPath ?? null,
        instance.pidFile ?? null,
        instance.incident ? JSON.stringify(instance.incident) : null,
        instance.createdAt.toISOString(),
      ]
    );
  }

  async remove(correlationId: string): Promise<void> {
    await this.db.run('DELETE FROM instances WHERE correlation_id = ?', [correlationId]);
  }

  async list(): Promise<Instance[]> {
    const rows = await this.db.all('SELECT * FROM instances ORDER BY created_at ASC');
    const instances: Instance[] = [];
    for (const row of rows) {
      const parsed = instanceRowSchema.safeParse(row);
      if (!parsed.success) {
        console.warn(`[Store] Skipping malformed instance row: ${parsed.error.message}`);
        continue;
      }
      instances.push(fromRow(parsed.data));
    }
    return instances;
  }
}

export class InMemoryInstanceStore implements InstanceStore {
  private readonly instances = new Map<string, Instance>();

  async save(instance: Instance): Promise<void> {
    const { apiContract: _contract, ...persisted } = instance;
    this.instances.set(instance.correlationId, structuredClone(persisted));
  }

  async remove(correlationId: string): Promise<void> {
    this.instances.delete(correlationId);
  }

  async list(): Promise<Instance[]> {
    return Array.from(this.instances.values()).map((instance) => structuredClone(instance));
  }
}
