import { z } from 'zod/v4';
import { ExitInfo, PortCheckResult } from '../types.js';
import { OrchestratorError, errorMessage } from '../errors.js';

const healthSchema = z.object({
  healthy: z.boolean(),
  version: z.string().optional(),
});

export interface CheckPortOptions {
  host?: string;
  path?: string;
  timeoutMs?: number;
}

/**
 * Asks the agent on `port` whether it is up. Never throws: an unreachable or
 * malformed answer is reported as unhealthy.
 */
export async function checkPort(port: number, options: CheckPortOptions = {}): Promise<PortCheckResult> {
  const host = options.host ?? '127.0.0.1';
  const path = options.path ?? '/global/health';
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs ?? 1000);

  try {
    const response = await fetch(`http://${host}:${port}${path}`, { signal: controller.signal });
    if (!response.ok) {
      return { port, reachable: true, healthy: false, error: `HTTP ${response.status}` };
    }

    const parsed = healthSchema.safeParse(await response.json());
    if (!parsed.success) {
      return { port, reachable: true, healthy: false, error: 'Unexpected health response' };
    }

    return { port, reachable: true, healthy: parsed.data.healthy, version: parsed.data.version };
  } catch (error) {
    const message = error instanceof Error && error.name === 'AbortError' ? 'Timed out' : errorMessage(error);
    return { port, reachable: false, healthy: false, error: message };
  } finally {
    clearTimeout(timeoutId);
  }
}

export interface WaitForReadyOptions extends CheckPortOptions {
  intervalMs: number;
  deadlineMs: number;
  // Resolves when the process under watch exits, which ends the wait early
  exited?: Promise<ExitInfo>;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function waitForReady(port: number, options: WaitForReadyOptions): Promise<PortCheckResult> {
  let exit: ExitInfo | undefined;
  void options.exited?.then((info) => {
    exit = info;
  });

  const deadline = Date.now() + options.deadlineMs;
  let last: PortCheckResult | undefined;

  while (Date.now() < deadline) {
    if (exit) {
      throw new OrchestratorError(
        'AgentSpawnFailed',
        `Agent on port ${port} exited before becoming ready (code ${exit.code}, signal ${exit.signal})`
      );
    }

    last = await checkPort(port, { ...options, timeoutMs: Math.min(options.timeoutMs ?? 1000, Math.max(deadline - Date.now(), 1)) });
    if (last.healthy) {
      return last;
    }

    await sleep(Math.min(options.intervalMs, Math.max(deadline - Date.now(), 0)));
  }

  throw new OrchestratorError(
    'StartupTimeout',
    `Agent on port ${port} not ready after ${options.deadlineMs}ms${last?.error ? ` (${last.error})` : ''}`
  );
}
