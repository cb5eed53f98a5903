import { spawn, ChildProcess } from 'child_process';
import { closeSync, openSync } from 'fs';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { AgentAdapter } from '../agents/base-adapter.js';
import { ExitInfo, SupervisedProcess } from '../types.js';
import { OrchestratorError, errorMessage } from '../errors.js';

export interface ProcessSupervisorConfig {
  adapter: AgentAdapter;
  pidDir: string;
  terminateGraceMs: number;
  hostname?: string;
  logFileName?: string;
}

export interface SpawnRequest {
  correlationId: string;
  workingCopyPath: string;
  port: number;
}

export type AdoptedProcess = Omit<SupervisedProcess, 'adopted' | 'startedAt'> & { startedAt?: Date };

/**
 * What the orchestrator needs from a supervisor.
 */
export interface AgentSupervisor {
  spawn(request: SpawnRequest): Promise<SupervisedProcess>;
  adopt(info: AdoptedProcess): void;
  isAlive(pid: number): boolean;
  terminate(pid: number, graceMs?: number): Promise<void>;
  wait(pid: number): Promise<ExitInfo>;
  forget(pid: number): void;
  list(): Array<SupervisedProcess & { alive: boolean }>;
  pidFileFor(correlationId: string): string;
  readPidFile(correlationId: string): Promise<number | null>;
  removePidFile(correlationId: string): Promise<void>;
}

interface ManagedProcess {
  info: SupervisedProcess;
  child?: ChildProcess;
  exited?: Promise<ExitInfo>;
  exit?: ExitInfo;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Starts agent processes and keeps a handle on them. The pid marker file is
 * only written for manual recovery by external tooling.
 */
export class ProcessSupervisor implements AgentSupervisor {
  private readonly processes = new Map<number, ManagedProcess>();
  private readonly adapter: AgentAdapter;
  private readonly pidDir: string;
  private readonly terminateGraceMs: number;
  private readonly hostname: string;
  private readonly logFileName: string;

  constructor(config: ProcessSupervisorConfig) {
    this.adapter = config.adapter;
    this.pidDir = config.pidDir;
    this.terminateGraceMs = config.terminateGraceMs;
    this.hostname = config.hostname ?? '127.0.0.1';
    this.logFileName = config.logFileName ?? 'agent.log';
  }

  pidFileFor(correlationId: string): string {
    return join(this.pidDir, `agent-${correlationId}.pid`);
  }

  /**
   * Launches the agent and returns as soon as it has a pid; readiness is
   * checked separately by polling its port.
   */
  async spawn(request: SpawnRequest): Promise<SupervisedProcess> {
    const { command, args, env } = this.adapter.getSpawnArgs({ port: request.port, hostname: this.hostname });
    const logPath = join(request.workingCopyPath, this.logFileName);
    const pidFile = this.pidFileFor(request.correlationId);

    await mkdir(this.pidDir, { recursive: true });

    const logFd = openSync(logPath, 'a');
    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        cwd: request.workingCopyPath,
        detached: true,
        stdio: ['ignore', logFd, logFd],
        env: { ...process.env, ...env },
      });
    } finally {
      closeSync(logFd);
    }

    child.on('error', (error) => {
      console.error(`[Supervisor] ${this.adapter.name} process for ${request.correlationId} error:`, error.message);
    });

    const pid = child.pid;
    if (pid === undefined) {
      throw new OrchestratorError('AgentSpawnFailed', `Failed to start ${command} for ${request.correlationId}`);
    }

    const info: SupervisedProcess = {
      pid,
      port: request.port,
      correlationId: request.correlationId,
      logPath,
      pidFile,
      startedAt: new Date(),
      adopted: false,
    };
    const managed: ManagedProcess = { info, child };
    managed.exited = new Promise<ExitInfo>((resolve) => {
      child.once('exit', (code, signal) => {
        managed.exit = { code, signal };
        console.log(`[Supervisor] ${this.adapter.name} pid ${pid} (${request.correlationId}) exited with code ${code}, signal ${signal}`);
        resolve(managed.exit);
      });
    });
    this.processes.set(pid, managed);

    await writeFile(pidFile, `${pid}\n`, 'utf-8');
    console.log(`[Supervisor] Started ${this.adapter.name} for ${request.correlationId} with pid ${pid} on port ${request.port}`);
    return { ...info };
  }

  /**
   * Tracks a process started by an earlier orchestrator run.
   */
  adopt(info: AdoptedProcess): void {
    this.processes.set(info.pid, {
      info: { ...info, startedAt: info.startedAt ?? new Date(), adopted: true },
    });
  }

  isAlive(pid: number): boolean {
    const managed = this.processes.get(pid);
    if (managed?.child) {
      return managed.exit === undefined;
    }

    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      return errnoCode(error) === 'EPERM';
    }
  }

  /**
   * SIGTERM, then SIGKILL once the grace period runs out. Safe to call on a
   * process that already exited.
   */
  async terminate(pid: number, graceMs: number = this.terminateGraceMs): Promise<void> {
    if (!this.isAlive(pid)) {
      return;
    }

    this.signal(pid, 'SIGTERM');

    const deadline = Date.now() + graceMs;
    while (Date.now() < deadline) {
      if (!this.isAlive(pid)) {
        return;
      }
      await sleep(50);
    }

    if (this.isAlive(pid)) {
      console.warn(`[Supervisor] pid ${pid} ignored SIGTERM for ${graceMs}ms, sending SIGKILL`);
      this.signal(pid, 'SIGKILL');
      const exited = this.processes.get(pid)?.exited;
      if (exited) {
        await Promise.race([exited, sleep(1000)]);
      }
    }
  }

  async wait(pid: number): Promise<ExitInfo> {
    const managed = this.processes.get(pid);
    if (managed?.exited) {
      return managed.exited;
    }

    while (this.isAlive(pid)) {
      await sleep(200);
    }
    return { code: null, signal: null };
  }

  forget(pid: number): void {
    this.processes.delete(pid);
  }

  get(pid: number): SupervisedProcess | undefined {
    const managed = this.processes.get(pid);
    return managed ? { ...managed.info } : undefined;
  }

  list(): Array<SupervisedProcess & { alive: boolean }> {
    return Array.from(this.processes.values()).map((managed) => ({
      ...managed.info,
      alive: this.isAlive(managed.info.pid),
    }));
  }

  async readPidFile(correlationId: string): Promise<number | null> {
    try {
      const content = await readFile(this.pidFileFor(correlationId), 'utf-8');
      const pid = Number.parseInt(content.trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : null;
    } catch {
      return null;
    }
  }

  async removePidFile(correlationId: string): Promise<void> {
    await rm(this.pidFileFor(correlationId), { force: true });
  }

  private signal(pid: number, signal: NodeJS.Signals): void {
    // Agents are started detached, so the pid is also their process group id
    try {
      process.kill(-pid, signal);
      return;
    } catch {
      // not a group leader, or already gone
    }

    try {
      process.kill(pid, signal);
    } catch (error) {
      if (errnoCode(error) !== 'ESRCH') {
        console.warn(`[Supervisor] Failed to send ${signal} to pid ${pid}: ${errorMessage(error)}`);
      }
    }
  }
}
