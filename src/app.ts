import express, { Express } from 'express';
import cors from 'cors';
import { AgentAdapter } from './agents/base-adapter.js';
import { Orchestrator } from './services/orchestrator.js';
import { ProxyService } from './services/proxy.js';
import { OrphanReaper } from './services/reaper.js';
import { AgentSupervisor } from './services/process-supervisor.js';
import { createInstanceRoutes } from './routes/instances.js';
import { createProcRoutes } from './routes/proc.js';
import { ProcessTableReader } from './services/process-table.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppDependencies {
  orchestrator: Orchestrator;
  proxy: ProxyService;
  reaper: OrphanReaper;
  supervisor: AgentSupervisor;
  adapter: AgentAdapter;
  corsOrigins: string[];
  proxyDeleteLimit: number;
  proxyDeleteWindowMs: number;
  processTable: ProcessTableReader;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(
    cors({
      origin: (origin, callback) => {
        // Requests without an origin (curl, other services) are always allowed
        if (!origin || deps.corsOrigins.length === 0 || deps.corsOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error('Not allowed by CORS'));
        }
      },
    })
  );

  app.get('/health', async (req, res, next) => {
    try {
      const availability = await deps.adapter.checkAvailability();
      res.json({
        status: 'healthy',
        agent: { available: availability.isAvailable, version: availability.version },
        instances: deps.orchestrator.list().length,
      });
    } catch (error) {
      next(error);
    }
  });

  app.use(
    '/instances',
    createInstanceRoutes(deps.orchestrator, deps.proxy, deps.reaper, {
      proxyDeleteLimit: deps.proxyDeleteLimit,
      proxyDeleteWindowMs: deps.proxyDeleteWindowMs,
    })
  );
  app.use(
    '/proc',
    createProcRoutes({ supervisor: deps.supervisor, adapter: deps.adapter, processTable: deps.processTable })
  );

  app.use((req, res) => {
    res.status(404).json({ error: `Cannot ${req.method} ${req.path}`, kind: 'NotFound' });
  });
  app.use(errorHandler);

  return app;
}
