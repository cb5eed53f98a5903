import { BaseAgentAdapter, SpawnArgs } from './base-adapter.js';

export interface OpenCodeAdapterOptions {
  bin?: string;
  healthPath?: string;
  contractPath?: string;
}

/**
 * Runs `opencode serve` headless: an HTTP server bound to one port, with its
 * OpenAPI document on /doc and a health endpoint on /global/health.
 */
export class OpenCodeAdapter extends BaseAgentAdapter {
  readonly name = 'OpenCode';
  readonly healthPath: string;
  readonly contractPath: string;

  constructor(options: OpenCodeAdapterOptions = {}) {
    super(options.bin ?? 'opencode');
    this.healthPath = options.healthPath ?? '/global/health';
    this.contractPath = options.contractPath ?? '/doc';
  }

  getSpawnArgs(options: { port: number; hostname: string }): SpawnArgs {
    return {
      command: this.command,
      args: ['serve', '--port', String(options.port), '--hostname', options.hostname, '--no-mdns'],
    };
  }

  matchesCommandLine(argv: string[]): boolean {
    return super.matchesCommandLine(argv) && argv.includes('serve');
  }
}
