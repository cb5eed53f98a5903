import { ApiContract, Instance, InstanceStatus } from '../types.js';
import { OrchestratorError } from '../errors.js';

const TRANSITIONS: Record<InstanceStatus, InstanceStatus[]> = {
  provisioning: ['running', 'draining', 'terminated'],
  running: ['draining'],
  draining: ['terminated'],
  terminated: [],
};

export type InstancePatch = Partial<Omit<Instance, 'correlationId' | 'status'>>;

/**
 * In-memory map of live instances keyed by correlation id. Callers get
 * copies, so a returned instance never changes under them.
 */
export class InstanceRegistry {
  private readonly instances = new Map<string, Instance>();

  register(instance: Instance): Instance {
    if (this.instances.has(instance.correlationId)) {
      throw new OrchestratorError('AlreadyExists', `Instance ${instance.correlationId} is already registered`);
    }
    this.instances.set(instance.correlationId, structuredClone(instance));
    return structuredClone(instance);
  }

  has(correlationId: string): boolean {
    return this.instances.has(correlationId);
  }

  get(correlationId: string): Instance | undefined {
    const instance = this.instances.get(correlationId);
    return instance ? structuredClone(instance) : undefined;
  }

  require(correlationId: string): Instance {
    const instance = this.get(correlationId);
    if (!instance) {
      throw new OrchestratorError('InstanceNotFound', `No instance for correlation id ${correlationId}`);
    }
    return instance;
  }

  list(): Instance[] {
    return Array.from(this.instances.values())
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((instance) => structuredClone(instance));
  }

  update(correlationId: string, patch: InstancePatch): Instance {
    const current = this.instances.get(correlationId);
    if (!current) {
      throw new OrchestratorError('InstanceNotFound', `No instance for correlation id ${correlationId}`);
    }
    const next: Instance = { ...current, ...structuredClone(patch) };
    this.instances.set(correlationId, next);
    return structuredClone(next);
  }

  transition(correlationId: string, status: InstanceStatus): Instance {
    const current = this.instances.get(correlationId);
    if (!current) {
      throw new OrchestratorError('InstanceNotFound', `No instance for correlation id ${correlationId}`);
    }
    if (current.status === status) {
      return structuredClone(current);
    }
    if (!TRANSITIONS[current.status].includes(status)) {
      throw new Error(`Instance ${correlationId} cannot move from ${current.status} to ${status}`);
    }
    current.status = status;
    return structuredClone(current);
  }

  setContract(correlationId: string, contract: ApiContract): void {
    const current = this.instances.get(correlationId);
    if (current) {
      current.apiContract = structuredClone(contract);
    }
  }

  remove(correlationId: string): boolean {
    return this.instances.delete(correlationId);
  }

  get size(): number {
    return this.instances.size;
  }
}
