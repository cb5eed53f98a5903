import { existsSync } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import {
  COMMIT_PATTERN,
  CORRELATION_ID_PATTERN,
  ChatRecord,
  ChatTranscript,
  Incident,
  Instance,
  SetupOptions,
  SetupResponse,
  toDescriptor,
} from '../types.js';
import { OrchestratorError, errorMessage } from '../errors.js';
import { KeyedMutex } from '../utils/mutex.js';
import { InstanceStore } from '../database/instance-store.js';
import { ChatStore } from '../database/chat-store.js';
import { InstanceRegistry } from './registry.js';
import { PortAllocator } from './port-allocator.js';
import { WorktreeService } from './git.js';
import { AgentSupervisor } from './process-supervisor.js';
import { CommitResolver } from './commit-resolvers.js';
import { checkPort, waitForReady } from './health.js';

export interface OrchestratorConfig {
  registry: InstanceRegistry;
  ports: PortAllocator;
  worktrees: WorktreeService;
  supervisor: AgentSupervisor;
  // Commit to debug when a setup request names none (what production runs)
  productionCommit: CommitResolver;
  store: InstanceStore;
  chats: ChatStore;
  healthPath: string;
  startupTimeoutMs: number;
  readinessIntervalMs: number;
  healthHost?: string;
  teardownOnShutdown?: boolean;
}

interface Acquired {
  port?: number;
  workingCopy?: boolean;
  registered?: boolean;
  pid?: number;
}

function sameCommit(a: string, b: string): boolean {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left.startsWith(right) || right.startsWith(left);
}

export function compareAdvice(sourceCommit: string, referenceCommit: string, mainBranch: string): string {
  if (sameCommit(sourceCommit, referenceCommit)) {
    return `The error occurred on the latest ${mainBranch} commit; no newer fixes are available.`;
  }
  return (
    `The error occurred on commit ${sourceCommit}. Compare with current ${mainBranch} (${referenceCommit}) ` +
    `to see whether the bug is already fixed, e.g. git diff ${sourceCommit}..${referenceCommit}.`
  );
}

/**
 * Owns the lifecycle of debug instances: every setup, delete and reap of a
 * given correlation id runs under that id's lock.
 */
export class Orchestrator {
  private readonly locks = new KeyedMutex();
  private readonly registry: InstanceRegistry;
  private readonly ports: PortAllocator;
  private readonly worktrees: WorktreeService;
  private readonly supervisor: AgentSupervisor;
  private readonly productionCommit: CommitResolver;
  private readonly store: InstanceStore;
  private readonly chats: ChatStore;
  private readonly healthPath: string;
  private readonly healthHost: string;
  private readonly startupTimeoutMs: number;
  private readonly readinessIntervalMs: number;
  private readonly teardownOnShutdown: boolean;

  constructor(config: OrchestratorConfig) {
    this.registry = config.registry;
    this.ports = config.ports;
    this.worktrees = config.worktrees;
    this.supervisor = config.supervisor;
    this.productionCommit = config.productionCommit;
    this.store = config.store;
    this.chats = config.chats;
    this.healthPath = config.healthPath;
    this.healthHost = config.healthHost ?? '127.0.0.1';
    this.startupTimeoutMs = config.startupTimeoutMs;
    this.readinessIntervalMs = config.readinessIntervalMs;
    this.teardownOnShutdown = config.teardownOnShutdown ?? false;
  }

  async setup(options: SetupOptions): Promise<SetupResponse> {
    const { correlationId } = options;
    if (!CORRELATION_ID_PATTERN.test(correlationId)) {
      throw new OrchestratorError('InvalidRequest', `Invalid correlation id: ${correlationId}`);
    }
    if (options.sourceCommit !== undefined && !COMMIT_PATTERN.test(options.sourceCommit)) {
      throw new OrchestratorError('InvalidRequest', `Invalid commit id: ${options.sourceCommit}`);
    }

    return this.locks.runExclusive(correlationId, async () => {
      const existing = this.registry.get(correlationId);
      if (existing) {
        if (await this.isHealthy(existing)) {
          console.log(`[Orchestrator] Reusing running instance ${correlationId} on port ${existing.port}`);
          return this.describeSetup(existing, true);
        }
        console.warn(`[Orchestrator] Instance ${correlationId} is ${existing.status} and unhealthy, replacing it`);
        await this.teardown(existing);
      }

      return this.provision(options);
    });
  }

  async delete(correlationId: string): Promise<void> {
    await this.locks.runExclusive(correlationId, async () => {
      const instance = this.registry.require(correlationId);
      await this.teardown(instance);
    });
  }

  list(): Instance[] {
    return this.registry.list();
  }

  get(correlationId: string): Instance | undefined {
    return this.registry.get(correlationId);
  }

  async saveChat(correlationId: string, transcript: ChatTranscript): Promise<ChatRecord> {
    this.registry.require(correlationId);
    const record = await this.chats.save(correlationId, transcript);
    console.log(`[Orchestrator] Saved chat ${record.id} for ${correlationId}`);
    return record;
  }

  listChats(correlationId: string): Promise<ChatRecord[]> {
    return this.chats.list(correlationId);
  }

  /**
   * Tears an instance down on behalf of the reaper. Returns false when the
   * instance is gone or no longer running by the time its lock is held.
   */
  async reap(correlationId: string, reason: string): Promise<boolean> {
    return this.locks.runExclusive(correlationId, async () => {
      const instance = this.registry.get(correlationId);
      if (!instance || instance.status !== 'running') {
        return false;
      }
      console.log(`[Orchestrator] Reaping ${correlationId}: ${reason}`);
      await this.teardown(instance);
      return true;
    });
  }

  /**
   * Removes working copies under the base directory that no instance owns,
   * such as those left behind by a crash mid-setup.
   */
  async removeUnownedWorkingCopies(): Promise<number> {
    const baseDir = this.worktrees.getBaseDir();
    let removed = 0;

    for (const worktree of await this.worktrees.listWorktrees()) {
      const path = resolve(worktree.path);
      if (dirname(path) !== baseDir || !existsSync(path)) continue;

      const correlationId = basename(path);
      const didRemove = await this.locks.runExclusive(correlationId, async () => {
        if (this.registry.has(correlationId)) return false;
        console.log(`[Orchestrator] Removing unowned working copy ${path}`);
        return this.worktrees.remove(correlationId);
      });
      if (didRemove) removed++;
    }

    return removed;
  }

  /**
   * Re-adopts instances persisted by a previous run whose agent is still
   * alive and healthy; tears down the rest.
   */
  async recover(): Promise<{ recovered: string[]; discarded: string[] }> {
    const recovered: string[] = [];
    const discarded: string[] = [];

    for (const persisted of await this.store.list()) {
      const id = persisted.correlationId;
      await this.locks.runExclusive(id, async () => {
        const marker = await this.supervisor.readPidFile(id);
        const ownsPid = persisted.pid !== undefined && marker === persisted.pid;
        const alive = ownsPid && persisted.pid !== undefined && this.supervisor.isAlive(persisted.pid);
        const usable =
          alive &&
          persisted.status === 'running' &&
          existsSync(persisted.workingCopyPath) &&
          this.ports.inRange(persisted.port) &&
          !this.ports.isReserved(persisted.port) &&
          (await this.check(persisted.port)).healthy;

        if (usable && persisted.pid !== undefined) {
          this.ports.reserve(persisted.port);
          this.supervisor.adopt({
            pid: persisted.pid,
            port: persisted.port,
            correlationId: id,
            logPath: persisted.logPath ?? join(persisted.workingCopyPath, 'agent.log'),
            pidFile: persisted.pidFile ?? this.supervisor.pidFileFor(id),
            startedAt: persisted.createdAt,
          });
          this.registry.register({ ...persisted, status: 'running' });
          recovered.push(id);
          console.log(`[Orchestrator] Recovered ${id} (pid ${persisted.pid}, port ${persisted.port})`);
          return;
        }

        console.log(`[Orchestrator] Discarding stale instance ${id}`);
        // A pid without a matching marker may have been reused by another process
        await this.teardown({ ...persisted, pid: ownsPid ? persisted.pid : undefined }, { releasePort: false });
        discarded.push(id);
      });
    }

    return { recovered, discarded };
  }

  async shutdown(): Promise<void> {
    if (!this.teardownOnShutdown) {
      console.log(`[Orchestrator] Leaving ${this.registry.size} instance(s) running for the next start`);
      return;
    }

    const instances = this.registry.list();
    console.log(`[Orchestrator] Tearing down ${instances.length} instance(s)`);
    await Promise.all(
      instances.map((instance) =>
        this.locks.runExclusive(instance.correlationId, async () => {
          const current = this.registry.get(instance.correlationId);
          if (current) await this.teardown(current);
        })
      )
    );
  }

  private async provision(options: SetupOptions): Promise<SetupResponse> {
    const { correlationId } = options;
    const acquired: Acquired = {};

    try {
      const port = await this.ports.allocate();
      acquired.port = port;

      const sourceCommit = options.sourceCommit ?? (await this.productionCommit.resolveReferenceCommit());
      const referenceCommit = await this.worktrees.fetchReferenceCommit();

      if (existsSync(this.worktrees.pathFor(correlationId))) {
        console.warn(`[Orchestrator] Removing leftover working copy for ${correlationId}`);
        await this.worktrees.remove(correlationId);
      }

      const workingCopy = await this.worktrees.create(correlationId, sourceCommit);
      acquired.workingCopy = true;

      if (options.incident) {
        await this.writeIncident(workingCopy.path, options.incident);
      }

      this.registry.register({
        correlationId,
        sourceCommit: workingCopy.commit,
        referenceCommit,
        workingCopyPath: workingCopy.path,
        branchName: workingCopy.branch,
        port,
        status: 'provisioning',
        createdAt: new Date(),
        incident: options.incident,
      });
      acquired.registered = true;

      const agent = await this.supervisor.spawn({ correlationId, workingCopyPath: workingCopy.path, port });
      acquired.pid = agent.pid;
      this.registry.update(correlationId, { pid: agent.pid, logPath: agent.logPath, pidFile: agent.pidFile });

      await waitForReady(port, {
        host: this.healthHost,
        path: this.healthPath,
        intervalMs: this.readinessIntervalMs,
        deadlineMs: this.startupTimeoutMs,
        exited: this.supervisor.wait(agent.pid),
      });

      const running = this.registry.transition(correlationId, 'running');
      await this.store.save(running);
      console.log(`[Orchestrator] Instance ${correlationId} running on port ${port} (pid ${agent.pid})`);
      return this.describeSetup(running, false);
    } catch (error) {
      console.error(`[Orchestrator] Setup of ${correlationId} failed: ${errorMessage(error)}`);
      await this.rollback(correlationId, acquired);
      throw error;
    }
  }

  private async rollback(correlationId: string, acquired: Acquired): Promise<void> {
    if (acquired.registered && this.registry.has(correlationId)) {
      this.registry.transition(correlationId, 'draining');
    }

    if (acquired.pid !== undefined) {
      await this.step(`terminate pid ${acquired.pid}`, async () => {
        if (acquired.pid === undefined) return;
        await this.supervisor.terminate(acquired.pid);
        this.supervisor.forget(acquired.pid);
        await this.supervisor.removePidFile(correlationId);
      });
    }

    if (acquired.workingCopy) {
      await this.step(`remove working copy of ${correlationId}`, () => this.worktrees.remove(correlationId));
    }

    if (acquired.registered) {
      this.registry.remove(correlationId);
    }

    if (acquired.port !== undefined) {
      this.ports.release(acquired.port);
    }
  }

  /**
   * Best-effort teardown: each step logs its failure and the next one runs.
   */
  private async teardown(instance: Instance, options: { releasePort?: boolean } = {}): Promise<void> {
    const id = instance.correlationId;
    if (this.registry.has(id)) {
      this.registry.transition(id, 'draining');
    }

    const pid = instance.pid;
    if (pid !== undefined) {
      await this.step(`terminate pid ${pid}`, async () => {
        await this.supervisor.terminate(pid);
        this.supervisor.forget(pid);
      });
    }
    await this.step(`remove pid file of ${id}`, () => this.supervisor.removePidFile(id));
    await this.step(`remove working copy of ${id}`, () => this.worktrees.remove(id));

    if (options.releasePort ?? true) {
      this.ports.release(instance.port);
    }
    if (this.registry.has(id)) {
      this.registry.transition(id, 'terminated');
      this.registry.remove(id);
    }
    await this.step(`forget ${id}`, () => this.store.remove(id));

    console.log(`[Orchestrator] Instance ${id} torn down`);
  }

  private async step(description: string, action: () => Promise<unknown>): Promise<void> {
    try {
      await action();
    } catch (error) {
      console.warn(`[Orchestrator] Could not ${description}: ${errorMessage(error)}`);
    }
  }

  private async isHealthy(instance: Instance): Promise<boolean> {
    if (instance.status !== 'running' || instance.pid === undefined) {
      return false;
    }
    if (!this.supervisor.isAlive(instance.pid)) {
      return false;
    }
    return (await this.check(instance.port)).healthy;
  }

  private check(port: number) {
    return checkPort(port, { host: this.healthHost, path: this.healthPath });
  }

  private async writeIncident(workingCopyPath: string, incident: Incident): Promise<void> {
    const dir = join(workingCopyPath, '.debug');
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'incident.json'), `${JSON.stringify(incident, null, 2)}\n`, 'utf-8');
  }

  private async describeSetup(instance: Instance, reused: boolean): Promise<SetupResponse> {
    const mainBranch = await this.worktrees.detectMainBranch();
    return {
      ...toDescriptor(instance),
      compare_advice: compareAdvice(instance.sourceCommit, instance.referenceCommit, mainBranch),
      matches_reference: sameCommit(instance.sourceCommit, instance.referenceCommit),
      reused,
    };
  }
}
