import { existsSync } from 'fs';
import { Instance, ReapStats } from '../types.js';
import { errorMessage } from '../errors.js';
import { Orchestrator } from './orchestrator.js';
import { WorktreeService } from './git.js';
import { AgentSupervisor } from './process-supervisor.js';

export interface ReaperConfig {
  intervalMs: number;
  // 0 disables the age limit
  maxInstanceAgeMs: number;
}

export class OrphanReaper {
  private readonly config: ReaperConfig;
  private timer: ReturnType<typeof setInterval> | null = null;
  private isRunning = false;

  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly worktrees: WorktreeService,
    private readonly supervisor: AgentSupervisor,
    config?: Partial<ReaperConfig>
  ) {
    this.config = {
      intervalMs: config?.intervalMs ?? 60 * 1000,
      maxInstanceAgeMs: config?.maxInstanceAgeMs ?? 48 * 60 * 60 * 1000,
    };
  }

  start(): void {
    if (this.timer || this.config.intervalMs <= 0) return;

    this.timer = setInterval(() => {
      this.runOnce().catch((error) => {
        console.error('[Reaper] Sweep error:', error);
      });
    }, this.config.intervalMs);
    this.timer.unref();

    console.log(`[Reaper] Started with interval ${this.config.intervalMs}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log('[Reaper] Stopped');
    }
  }

  /**
   * One sweep. A sweep already in progress makes this a no-op returning
   * empty stats.
   */
  async runOnce(): Promise<ReapStats> {
    const stats: ReapStats = { removedWorktrees: 0, prunedBranches: 0, reapedInstances: [] };
    if (this.isRunning) {
      return stats;
    }

    this.isRunning = true;
    try {
      const now = Date.now();
      for (const instance of this.orchestrator.list()) {
        const reason = this.staleReason(instance, now);
        if (!reason) continue;

        try {
          if (await this.orchestrator.reap(instance.correlationId, reason)) {
            stats.reapedInstances.push(instance.correlationId);
          }
        } catch (error) {
          console.error(`[Reaper] Failed to reap ${instance.correlationId}: ${errorMessage(error)}`);
        }
      }

      stats.removedWorktrees += await this.orchestrator.removeUnownedWorkingCopies();

      const sweep = await this.worktrees.sweepOrphans();
      stats.removedWorktrees += sweep.removedWorktrees;
      stats.prunedBranches += sweep.prunedBranches;

      if (stats.removedWorktrees + stats.prunedBranches + stats.reapedInstances.length > 0) {
        console.log('[Reaper] Sweep complete:', stats);
      }
      return stats;
    } finally {
      this.isRunning = false;
    }
  }

  private staleReason(instance: Instance, now: number): string | null {
    if (instance.status !== 'running') {
      return null;
    }
    if (instance.pid === undefined || !this.supervisor.isAlive(instance.pid)) {
      return 'agent process is gone';
    }
    if (!existsSync(instance.workingCopyPath)) {
      return 'working copy is gone';
    }
    if (this.config.maxInstanceAgeMs > 0 && now - instance.createdAt.getTime() > this.config.maxInstanceAgeMs) {
      return `older than ${this.config.maxInstanceAgeMs}ms`;
    }
    return null;
  }
}
