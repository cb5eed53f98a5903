import 'dotenv/config';
import { createServer } from 'http';
import { loadConfig } from './config/app.config.js';
import { createApp } from './app.js';
import { OpenCodeAdapter } from './agents/opencode-adapter.js';
import { DatabaseService } from './database/database.js';
import { SqliteInstanceStore } from './database/instance-store.js';
import { SqliteChatStore } from './database/chat-store.js';
import { createGitRunner, WorktreeService } from './services/git.js';
import {
  CommandCommitResolver,
  CommitResolver,
  FallbackCommitResolver,
  HttpCommitResolver,
  LocalHeadResolver,
} from './services/commit-resolvers.js';
import { InstanceRegistry } from './services/registry.js';
import { PortAllocator } from './services/port-allocator.js';
import { ProcessSupervisor } from './services/process-supervisor.js';
import { Orchestrator } from './services/orchestrator.js';
import { ProxyService } from './services/proxy.js';
import { OrphanReaper } from './services/reaper.js';
import { createPsReader } from './services/process-table.js';

const config = loadConfig();

if (typeof process.getuid === 'function' && process.getuid() === 0 && !config.server.allowRoot) {
  console.error('Refusing to run as root: agents would inherit full privileges. Set ALLOW_ROOT=true to override.');
  process.exit(1);
}

const git = createGitRunner({ repoPath: config.repository.projectPath, sshKeyPath: config.repository.sshKeyPath });
const worktrees = new WorktreeService({
  projectPath: config.repository.projectPath,
  baseDir: config.worktrees.baseDir,
  envTemplate: config.worktrees.envTemplate,
  mainBranch: config.repository.mainBranch,
  repoUrl: config.repository.url,
  git,
});

const resolvers: CommitResolver[] = [];
if (config.productionCommit.command) {
  resolvers.push(new CommandCommitResolver(config.productionCommit.command, { cwd: config.repository.projectPath }));
}
if (config.productionCommit.url) {
  resolvers.push(new HttpCommitResolver(config.productionCommit.url, { field: config.productionCommit.field }));
}
resolvers.push(new LocalHeadResolver(() => worktrees.resolveHead()));

const adapter = new OpenCodeAdapter({
  bin: config.agent.bin,
  healthPath: config.agent.healthPath,
  contractPath: config.agent.contractPath,
});
const supervisor = new ProcessSupervisor({
  adapter,
  pidDir: config.agent.pidDir,
  terminateGraceMs: config.agent.terminateGraceMs,
});
const registry = new InstanceRegistry();
const ports = new PortAllocator(config.ports);
const db = new DatabaseService(config.databasePath);

const orchestrator = new Orchestrator({
  registry,
  ports,
  worktrees,
  supervisor,
  productionCommit: new FallbackCommitResolver(resolvers),
  store: new SqliteInstanceStore(db),
  chats: new SqliteChatStore(db),
  healthPath: adapter.healthPath,
  startupTimeoutMs: config.agent.startupTimeoutMs,
  readinessIntervalMs: config.agent.readinessIntervalMs,
  teardownOnShutdown: config.shutdownTeardown,
});
const proxy = new ProxyService({
  registry,
  contractPath: adapter.contractPath,
  contractFetchTimeoutMs: config.proxy.contractFetchTimeoutMs,
  allowUnfiltered: config.proxy.allowUnfiltered,
});
const reaper = new OrphanReaper(orchestrator, worktrees, supervisor, {
  intervalMs: config.reaper.intervalMs,
  maxInstanceAgeMs: config.reaper.maxInstanceAgeMs,
});

const app = createApp({
  orchestrator,
  proxy,
  reaper,
  supervisor,
  adapter,
  corsOrigins: config.server.corsOrigins,
  proxyDeleteLimit: config.proxy.deleteLimit,
  proxyDeleteWindowMs: config.proxy.deleteWindowMs,
  processTable: createPsReader(),
});
const server = createServer(app);

async function start(): Promise<void> {
  await worktrees.ensureRepository();
  await db.waitForInit();

  const availability = await adapter.checkAvailability();
  if (!availability.isAvailable) {
    console.warn(`[Server] ${adapter.name} is not available: ${availability.statusMessage}`);
  }

  const { recovered, discarded } = await orchestrator.recover();
  if (recovered.length + discarded.length > 0) {
    console.log(`[Server] Recovered ${recovered.length} instance(s), discarded ${discarded.length}`);
  }

  reaper.start();

  server.listen(config.server.port, config.server.host, () => {
    console.log(`Debug orchestrator running on ${config.server.host}:${config.server.port}`);
    console.log(`Working copies under ${config.worktrees.baseDir}, agent ports ${config.ports.start}-${config.ports.end}`);
  });
}

let shuttingDown = false;

const gracefulShutdown = async () => {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log('Shutting down gracefully...');

  reaper.stop();
  server.close();
  try {
    await orchestrator.shutdown();
    await db.close();
  } catch (error) {
    console.error('Error during shutdown:', error);
    process.exit(1);
  }
  console.log('Server closed');
  process.exit(0);
};

process.on('SIGTERM', () => void gracefulShutdown());
process.on('SIGINT', () => void gracefulShutdown());

start().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
