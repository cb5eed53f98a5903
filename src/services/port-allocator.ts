import net from 'net';
import { OrchestratorError } from '../errors.js';
import { Mutex } from '../utils/mutex.js';

export type PortProbe = (port: number) => Promise<boolean>;

export interface PortRange {
  start: number;
  end: number;
}

/**
 * True when nothing is listening on the port: we can bind it ourselves.
 */
export function isPortFree(port: number, host: string = '127.0.0.1'): Promise<boolean> {
  return new Promise((resolve) => {
    const server = net.createServer();
    server.once('error', () => resolve(false));
    server.once('listening', () => {
      server.close(() => resolve(true));
    });
    server.listen(port, host);
  });
}

export class PortAllocator {
  private readonly reserved = new Set<number>();
  private readonly lock = new Mutex();

  constructor(
    private readonly range: PortRange,
    private readonly probe: PortProbe = isPortFree
  ) {
    if (range.start > range.end) {
      throw new Error(`Invalid port range ${range.start}-${range.end}`);
    }
  }

  async allocate(): Promise<number> {
    return this.lock.runExclusive(async () => {
      for (let port = this.range.start; port <= this.range.end; port++) {
        if (this.reserved.has(port)) continue;
        if (await this.probe(port)) {
          this.reserved.add(port);
          return port;
        }
      }

      throw new OrchestratorError(
        'ResourceExhausted',
        `No free port in range ${this.range.start}-${this.range.end}`
      );
    });
  }

  /**
   * Marks a port as taken without probing, for instances that survived a restart.
   */
  reserve(port: number): void {
    if (!this.inRange(port)) {
      throw new Error(`Port ${port} is outside ${this.range.start}-${this.range.end}`);
    }
    this.reserved.add(port);
  }

  release(port: number): void {
    this.reserved.delete(port);
  }

  isReserved(port: number): boolean {
    return this.reserved.has(port);
  }

  inRange(port: number): boolean {
    return port >= this.range.start && port <= this.range.end;
  }

  getReserved(): number[] {
    return Array.from(this.reserved).sort((a, b) => a - b);
  }
}
