import { Router } from 'express';
import { z } from 'zod/v4';
import { OrchestratorError, errorMessage } from '../errors.js';
import { AgentAdapter } from '../agents/base-adapter.js';
import { checkPort } from '../services/health.js';
import { AgentSupervisor } from '../services/process-supervisor.js';
import { ProcessTableReader, findAgentProcesses } from '../services/process-table.js';

const portQuerySchema = z.coerce.number().int().min(1).max(65535);
const pidParamSchema = z.coerce.number().int().min(1);

export interface ProcRouteDependencies {
  supervisor: AgentSupervisor;
  adapter: AgentAdapter;
  processTable: ProcessTableReader;
}

export function createProcRoutes({ supervisor, adapter, processTable }: ProcRouteDependencies): Router {
  const router = Router();

  router.get('/check_port', async (req, res, next) => {
    try {
      const port = portQuerySchema.safeParse(req.query.port);
      if (!port.success) {
        throw new OrchestratorError('InvalidRequest', 'port must be an integer between 1 and 65535');
      }

      const result = await checkPort(port.data, { path: adapter.healthPath });
      res.status(result.healthy ? 200 : 502).json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * Supervised agents, plus agent servers in the process table that nothing
   * here supervises (left over from a crash or started by hand).
   */
  router.get('/agents', async (req, res) => {
    const supervised = supervisor.list();
    const known = new Set(supervised.map((agent) => agent.pid));

    let untracked: Array<{ pid: number; port: number | null; cmdline: string }> | null = null;
    let scanError: string | undefined;
    try {
      untracked = (await findAgentProcesses(adapter, processTable)).filter((found) => !known.has(found.pid));
    } catch (error) {
      scanError = errorMessage(error);
      console.warn(`[Proc] Could not read the process table: ${scanError}`);
    }

    res.json({
      agents: supervised.map((agent) => ({
        pid: agent.pid,
        port: agent.port,
        correlation_id: agent.correlationId,
        alive: agent.alive,
        adopted: agent.adopted,
        started_at: agent.startedAt.toISOString(),
        log_path: agent.logPath,
      })),
      untracked,
      ...(scanError ? { scan_error: scanError } : {}),
    });
  });

  // Only agents this orchestrator started or adopted can be killed
  router.delete('/:pid', async (req, res, next) => {
    try {
      const parsed = pidParamSchema.safeParse(req.params.pid);
      if (!parsed.success) {
        throw new OrchestratorError('InvalidRequest', 'pid must be a positive integer');
      }

      const pid = parsed.data;
      const agent = supervisor.list().find((candidate) => candidate.pid === pid);
      if (!agent) {
        res.status(404).json({ success: false, message: `No supervised agent with pid ${pid}` });
        return;
      }
      if (!agent.alive) {
        res.json({ success: false, message: `Agent ${pid} for ${agent.correlationId} has already exited` });
        return;
      }

      await supervisor.terminate(pid);
      console.log(`[Proc] Terminated agent ${pid} for ${agent.correlationId}`);
      res.json({ success: true, message: `Terminated agent ${pid} for ${agent.correlationId}` });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
