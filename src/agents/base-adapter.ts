import { spawn } from 'child_process';
import { basename } from 'path';

export interface SpawnArgs {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

export interface AgentAvailability {
  isAvailable: boolean;
  version?: string;
  statusMessage?: string;
}

export interface AgentAdapter {
  readonly name: string;
  readonly command: string;
  // Path answering the readiness check
  readonly healthPath: string;
  // Path serving the OpenAPI document used to filter proxied calls
  readonly contractPath: string;

  checkAvailability(): Promise<AgentAvailability>;
  getSpawnArgs(options: { port: number; hostname: string }): SpawnArgs;
  // Whether a command line from the process table is one of this agent's servers
  matchesCommandLine(argv: string[]): boolean;
}

export abstract class BaseAgentAdapter implements AgentAdapter {
  abstract readonly name: string;
  abstract readonly healthPath: string;
  abstract readonly contractPath: string;

  constructor(readonly command: string) {}

  abstract getSpawnArgs(options: { port: number; hostname: string }): SpawnArgs;

  matchesCommandLine(argv: string[]): boolean {
    const binary = basename(this.command);
    return argv.some((arg) => basename(arg) === binary);
  }

  async checkAvailability(): Promise<AgentAvailability> {
    try {
      const result = await this.runCommand(['--version']);
      if (result.code !== 0) {
        return {
          isAvailable: false,
          statusMessage: result.stderr.trim() || `${this.command} --version exited with ${result.code}`,
        };
      }
      return {
        isAvailable: true,
        version: this.parseVersion(result.stdout),
        statusMessage: 'Available',
      };
    } catch (error) {
      return {
        isAvailable: false,
        statusMessage: error instanceof Error ? error.message : 'Command not found',
      };
    }
  }

  protected runCommand(args: string[], timeoutMs: number = 10000): Promise<{ stdout: string; stderr: string; code: number }> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.command, args, { stdio: 'pipe', env: process.env });
      let stdout = '';
      let stderr = '';

      const timeout = setTimeout(() => {
        child.kill();
        reject(new Error('Command timeout'));
      }, timeoutMs);

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        clearTimeout(timeout);
        resolve({ stdout, stderr, code: code ?? 0 });
      });

      child.on('error', (error) => {
        clearTimeout(timeout);
        reject(error);
      });
    });
  }

  protected parseVersion(output: string): string | undefined {
    const versionPatterns = [
      /version\s+([^\s\n]+)/i,
      /v?(\d+\.\d+\.\d+[^\s]*)/,
    ];

    for (const pattern of versionPatterns) {
      const match = output.match(pattern);
      if (match) {
        return match[1];
      }
    }

    return output.split('\n')[0]?.trim() || undefined;
  }
}
