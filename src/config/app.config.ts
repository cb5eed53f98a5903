// Application configuration
// Every setting comes from the environment (a .env file is loaded by the server entrypoint)

import { tmpdir } from 'os';
import { createEnv } from '@t3-oss/env-core';
import { z } from 'zod/v4';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const port = z.coerce.number().int().min(1).max(65535);
const millis = z.coerce.number().int().min(0);

export interface AppConfig {
  server: {
    host: string;
    port: number;
    corsOrigins: string[];
    allowRoot: boolean;
  };
  repository: {
    url?: string;
    projectPath: string;
    mainBranch?: string;
    sshKeyPath?: string;
  };
  worktrees: {
    baseDir: string;
    envTemplate: string;
  };
  ports: {
    start: number;
    end: number;
  };
  productionCommit: {
    command?: string;
    url?: string;
    field: string;
  };
  agent: {
    bin: string;
    healthPath: string;
    contractPath: string;
    startupTimeoutMs: number;
    readinessIntervalMs: number;
    terminateGraceMs: number;
    pidDir: string;
  };
  proxy: {
    allowUnfiltered: boolean;
    contractFetchTimeoutMs: number;
    deleteLimit: number;
    deleteWindowMs: number;
  };
  reaper: {
    intervalMs: number;
    maxInstanceAgeMs: number;
  };
  databasePath: string;
  shutdownTeardown: boolean;
}

export function loadConfig(runtimeEnv: Record<string, string | undefined> = process.env): AppConfig {
  const env = createEnv({
    server: {
      HOST: z.string().default('0.0.0.0'),
      PORT: port.default(8000),
      CORS_ORIGINS: z.string().optional(),
      ALLOW_ROOT: flag,
      REPO_URL: z.string().min(1).optional(),
      PROJECT_PATH: z.string().min(1).default('/repo'),
      MAIN_BRANCH: z.string().min(1).optional(),
      GIT_SSH_KEY_PATH: z.string().min(1).optional(),
      WORKTREE_BASE: z.string().min(1).default('/tmp/debug-worktrees'),
      DEBUG_ENV_TEMPLATE: z.string().min(1).default('.env.debug.template'),
      PORT_RANGE_START: port.default(4100),
      PORT_RANGE_END: port.default(4200),
      PROD_COMMIT_COMMAND: z.string().min(1).optional(),
      PROD_COMMIT_URL: z.url().optional(),
      PROD_COMMIT_FIELD: z.string().min(1).default('commit'),
      AGENT_BIN: z.string().min(1).default('opencode'),
      AGENT_HEALTH_PATH: z.string().startsWith('/').default('/global/health'),
      AGENT_CONTRACT_PATH: z.string().startsWith('/').default('/doc'),
      STARTUP_TIMEOUT_MS: millis.default(15_000),
      READINESS_INTERVAL_MS: millis.default(250),
      TERMINATE_GRACE_MS: millis.default(5_000),
      CONTRACT_FETCH_TIMEOUT_MS: millis.default(5_000),
      PROXY_ALLOW_UNFILTERED: flag,
      PROXY_DELETE_LIMIT: z.coerce.number().int().min(1).default(5),
      PROXY_DELETE_WINDOW_MS: millis.default(60_000),
      REAPER_INTERVAL_MS: millis.default(60_000),
      INSTANCE_MAX_AGE_MS: millis.default(48 * 60 * 60 * 1000),
      PID_DIR: z.string().min(1).default(tmpdir()),
      DATABASE_PATH: z.string().min(1).default('instances.db'),
      SHUTDOWN_TEARDOWN: flag,
    },
    runtimeEnv,
    emptyStringAsUndefined: true,
  });

  if (env.PORT_RANGE_START > env.PORT_RANGE_END) {
    throw new Error(
      `Invalid port range: PORT_RANGE_START (${env.PORT_RANGE_START}) is greater than PORT_RANGE_END (${env.PORT_RANGE_END})`
    );
  }

  return {
    server: {
      host: env.HOST,
      port: env.PORT,
      corsOrigins: env.CORS_ORIGINS
        ? env.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
        : [],
      allowRoot: env.ALLOW_ROOT,
    },
    repository: {
      url: env.REPO_URL,
      projectPath: env.PROJECT_PATH,
      mainBranch: env.MAIN_BRANCH,
      sshKeyPath: env.GIT_SSH_KEY_PATH,
    },
    worktrees: {
      baseDir: env.WORKTREE_BASE,
      envTemplate: env.DEBUG_ENV_TEMPLATE,
    },
    ports: {
      start: env.PORT_RANGE_START,
      end: env.PORT_RANGE_END,
    },
    productionCommit: {
      command: env.PROD_COMMIT_COMMAND,
      url: env.PROD_COMMIT_URL,
      field: env.PROD_COMMIT_FIELD,
    },
    agent: {
      bin: env.AGENT_BIN,
      healthPath: env.AGENT_HEALTH_PATH,
      contractPath: env.AGENT_CONTRACT_PATH,
      startupTimeoutMs: env.STARTUP_TIMEOUT_MS,
      readinessIntervalMs: env.READINESS_INTERVAL_MS,
      terminateGraceMs: env.TERMINATE_GRACE_MS,
      pidDir: env.PID_DIR,
    },
    proxy: {
      allowUnfiltered: env.PROXY_ALLOW_UNFILTERED,
      contractFetchTimeoutMs: env.CONTRACT_FETCH_TIMEOUT_MS,
      deleteLimit: env.PROXY_DELETE_LIMIT,
      deleteWindowMs: env.PROXY_DELETE_WINDOW_MS,
    },
    reaper: {
      intervalMs: env.REAPER_INTERVAL_MS,
      maxInstanceAgeMs: env.INSTANCE_MAX_AGE_MS,
    },
    databasePath: env.DATABASE_PATH,
    shutdownTeardown: env.SHUTDOWN_TEARDOWN,
  };
}
