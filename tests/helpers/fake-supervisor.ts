import express from 'express';
import { Server } from 'http';
import { join } from 'path';
import { AdoptedProcess, AgentSupervisor, SpawnRequest } from '../../src/services/process-supervisor.js';
import { ExitInfo, SupervisedProcess } from '../../src/types.js';
import { OrchestratorError } from '../../src/errors.js';

export const AGENT_DOCUMENT = {
  openapi: '3.1.0',
  info: { title: 'fake agent', version: '1.0.0' },
  paths: {
    '/global/health': { get: {} },
    '/session': { get: {}, post: {} },
    '/session/{id}': { get: {}, delete: {} },
    '/session/{id}/message': { post: {} },
    '/session/{id}/events': { get: {} },
  },
};

export type FakeAgentMode = 'healthy' | 'never-ready' | 'spawn-fails';

export interface FakeAgent {
  info: SupervisedProcess;
  server?: Server;
  alive: boolean;
  exited: Promise<ExitInfo>;
  markExited: (info: ExitInfo) => void;
  // Requests that reached the agent, other than health and contract fetches
  requests: string[];
  contractFetches: number;
  // Open event streams waiting for the test to finish them
  openStreams: Array<() => void>;
}

/**
 * Supervisor whose "agents" are Express apps listening in this process.
 */
export class FakeSupervisor implements AgentSupervisor {
  mode: FakeAgentMode = 'healthy';
  readonly agents = new Map<number, FakeAgent>();
  readonly pidFiles = new Map<string, number>();
  private nextPid = 900_001;

  constructor(private readonly pidDir: string = '/tmp/fake-pids') {}

  async spawn(request: SpawnRequest): Promise<SupervisedProcess> {
    if (this.mode === 'spawn-fails') {
      throw new OrchestratorError('AgentSpawnFailed', `Failed to start agent for ${request.correlationId}`);
    }

    const pid = this.nextPid++;
    let markExited: (info: ExitInfo) => void = () => {};
    const exited = new Promise<ExitInfo>((resolve) => {
      markExited = resolve;
    });
    const agent: FakeAgent = {
      info: {
        pid,
        port: request.port,
        correlationId: request.correlationId,
        logPath: join(request.workingCopyPath, 'agent.log'),
        pidFile: this.pidFileFor(request.correlationId),
        startedAt: new Date(),
        adopted: false,
      },
      alive: true,
      exited,
      markExited,
      requests: [],
      contractFetches: 0,
      openStreams: [],
    };

    if (this.mode === 'healthy') {
      agent.server = await this.listen(agent, request.port);
    }

    this.agents.set(pid, agent);
    this.pidFiles.set(request.correlationId, pid);
    return { ...agent.info };
  }

  adopt(info: AdoptedProcess): void {
    // a restarted orchestrator sharing this supervisor adopts agents it already runs
    const previous = this.agents.get(info.pid);
    if (previous) {
      previous.info = { ...previous.info, adopted: true };
      return;
    }

    let markExited: (exit: ExitInfo) => void = () => {};
    const exited = new Promise<ExitInfo>((resolve) => {
      markExited = resolve;
    });
    this.agents.set(info.pid, {
      info: { ...info, startedAt: info.startedAt ?? new Date(), adopted: true },
      alive: true,
      exited,
      markExited,
      requests: [],
      contractFetches: 0,
      openStreams: [],
    });
  }

  isAlive(pid: number): boolean {
    return this.agents.get(pid)?.alive ?? false;
  }

  async terminate(pid: number): Promise<void> {
    const agent = this.agents.get(pid);
    if (!agent || !agent.alive) return;
    await this.stopServer(agent);
    agent.alive = false;
    agent.markExited({ code: null, signal: 'SIGTERM' });
  }

  /** Simulates the agent dying on its own. */
  async crash(pid: number): Promise<void> {
    const agent = this.agents.get(pid);
    if (!agent) return;
    await this.stopServer(agent);
    agent.alive = false;
    agent.markExited({ code: 1, signal: null });
  }

  wait(pid: number): Promise<ExitInfo> {
    return this.agents.get(pid)?.exited ?? Promise.resolve({ code: null, signal: null });
  }

  forget(pid: number): void {
    this.agents.delete(pid);
  }

  list(): Array<SupervisedProcess & { alive: boolean }> {
    return Array.from(this.agents.values()).map((agent) => ({ ...agent.info, alive: agent.alive }));
  }

  agentFor(correlationId: string): FakeAgent | undefined {
    return Array.from(this.agents.values()).find((agent) => agent.info.correlationId === correlationId);
  }

  pidFileFor(correlationId: string): string {
    return join(this.pidDir, `agent-${correlationId}.pid`);
  }

  async readPidFile(correlationId: string): Promise<number | null> {
    return this.pidFiles.get(correlationId) ?? null;
  }

  async removePidFile(correlationId: string): Promise<void> {
    this.pidFiles.delete(correlationId);
  }

  async stopAll(): Promise<void> {
    await Promise.all(Array.from(this.agents.values()).map((agent) => this.stopServer(agent)));
  }

  private listen(agent: FakeAgent, port: number): Promise<Server> {
    const app = express();
    app.use(express.json());

    app.get('/global/health', (req, res) => {
      res.json({ healthy: true, version: '0.0.0-test' });
    });
    app.get('/doc', (req, res) => {
      agent.contractFetches++;
      res.json(AGENT_DOCUMENT);
    });
    app.use((req, res, next) => {
      agent.requests.push(`${req.method} ${req.originalUrl}`);
      next();
    });
    app.get('/session', (req, res) => {
      res.json([{ id: 'ses_1' }]);
    });
    app.get('/session/:id', (req, res) => {
      res.json({
        id: req.params.id,
        query: req.query,
        forwardedFor: req.headers['x-forwarded-for'] ?? null,
        realIp: req.headers['x-real-ip'] ?? null,
        host: req.headers.host ?? null,
      });
    });
    app.post('/session/:id/message', (req, res) => {
      res.status(201).json({ id: req.params.id, received: req.body });
    });
    app.get('/session/:id/events', (req, res) => {
      res.writeHead(200, { 'Content-Type': 'text/event-stream' });
      res.write('data: started\n\n');
      agent.openStreams.push(() => {
        res.end('data: finished\n\n');
      });
    });
    app.delete('/session/:id', (req, res) => {
      res.json({ deleted: req.params.id });
    });

    return new Promise((resolve, reject) => {
      const server = app.listen(port, '127.0.0.1');
      server.once('listening', () => resolve(server));
      server.once('error', (error) =>
        reject(new OrchestratorError('AgentSpawnFailed', `Fake agent could not listen on ${port}: ${error.message}`))
      );
    });
  }

  private stopServer(agent: FakeAgent): Promise<void> {
    const server = agent.server;
    agent.server = undefined;
    if (!server) return Promise.resolve();
    return new Promise((resolve) => {
      server.closeAllConnections();
      server.close(() => resolve());
    });
  }
}
