import { execFile } from 'child_process';
import { promisify } from 'util';
import { AgentAdapter } from '../agents/base-adapter.js';

const execFileAsync = promisify(execFile);

/**
 * Returns the process table as `ps -eo pid=,args=` prints it.
 */
export type ProcessTableReader = () => Promise<string>;

export interface ProcessTableEntry {
  pid: number;
  argv: string[];
  cmdline: string;
}

export interface AgentProcess {
  pid: number;
  port: number | null;
  cmdline: string;
}

export function createPsReader(timeoutMs: number = 5000): ProcessTableReader {
  return async () => {
    const { stdout } = await execFileAsync('ps', ['-eo', 'pid=,args='], {
      timeout: timeoutMs,
      maxBuffer: 10 * 1024 * 1024,
    });
    return stdout;
  };
}

export function parseProcessTable(output: string): ProcessTableEntry[] {
  const entries: ProcessTableEntry[] = [];
  for (const line of output.split('\n')) {
    const match = line.trim().match(/^(\d+)\s+(.+)$/);
    if (!match) continue;

    const [, pid = '', cmdline = ''] = match;
    entries.push({ pid: Number.parseInt(pid, 10), argv: cmdline.split(/\s+/), cmdline });
  }
  return entries;
}

export function portFromArgs(argv: string[]): number | null {
  for (const [index, arg] of argv.entries()) {
    const value = arg === '--port' ? argv[index + 1] : arg.startsWith('--port=') ? arg.slice(7) : undefined;
    if (value === undefined) continue;

    const port = Number.parseInt(value, 10);
    return Number.isInteger(port) && port > 0 && port <= 65535 ? port : null;
  }
  return null;
}

/**
 * Agent servers running on this host, whoever started them.
 */
export async function findAgentProcesses(adapter: AgentAdapter, read: ProcessTableReader): Promise<AgentProcess[]> {
  return parseProcessTable(await read())
    .filter((entry) => entry.pid !== process.pid && adapter.matchesCommandLine(entry.argv))
    .map((entry) => ({ pid: entry.pid, port: portFromArgs(entry.argv), cmdline: entry.cmdline }));
}
