import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod/v4';
import { COMMIT_PATTERN } from '../types.js';
import { errorMessage } from '../errors.js';

const execFileAsync = promisify(execFile);

/**
 * A way of finding out which commit is currently deployed to production.
 */
export interface CommitResolver {
  readonly name: string;
  resolveReferenceCommit(): Promise<string>;
}

function assertCommit(value: string, source: string): string {
  const commit = value.trim();
  if (!COMMIT_PATTERN.test(commit)) {
    throw new Error(`${source} returned "${commit.slice(0, 80)}", which is not a commit id`);
  }
  return commit;
}

/**
 * Splits a command line into argv, honouring single and double quotes.
 * No shell is involved, so there is no expansion or piping.
 */
export function splitCommand(command: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let inToken = false;

  for (const char of command) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        args.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (quote) {
    throw new Error(`Unterminated ${quote} quote in command: ${command}`);
  }
  if (inToken) {
    args.push(current);
  }
  return args;
}

export class CommandCommitResolver implements CommitResolver {
  readonly name = 'command';
  private readonly argv: string[];

  constructor(
    command: string,
    private readonly options: { cwd?: string; timeoutMs?: number } = {}
  ) {
    this.argv = splitCommand(command);
    if (this.argv.length === 0) {
      throw new Error('Commit command is empty');
    }
  }

  async resolveReferenceCommit(): Promise<string> {
    const [file, ...args] = this.argv;
    const { stdout } = await execFileAsync(file, args, {
      cwd: this.options.cwd,
      timeout: this.options.timeoutMs ?? 30_000,
    });
    const firstLine = stdout.split('\n').find((line) => line.trim().length > 0) ?? '';
    return assertCommit(firstLine, `Command "${this.argv.join(' ')}"`);
  }
}

const commitPayloadSchema = z.record(z.string(), z.unknown());

export class HttpCommitResolver implements CommitResolver {
  readonly name = 'http';

  constructor(
    private readonly url: string,
    private readonly options: { field?: string; timeoutMs?: number } = {}
  ) {}

  async resolveReferenceCommit(): Promise<string> {
    const timeoutMs = this.options.timeoutMs ?? 10_000;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(this.url, { signal: controller.signal });
      if (!response.ok) {
        throw new Error(`${this.url} answered ${response.status} ${response.statusText}`);
      }

      const body = await response.text();
      const contentType = response.headers.get('content-type') ?? '';
      if (!contentType.includes('json')) {
        return assertCommit(body, this.url);
      }

      const field = this.options.field ?? 'commit';
      const payload = commitPayloadSchema.parse(JSON.parse(body));
      const value = payload[field];
      if (typeof value !== 'string') {
        throw new Error(`${this.url} response has no string field "${field}"`);
      }
      return assertCommit(value, this.url);
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`${this.url} did not answer within ${timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export class LocalHeadResolver implements CommitResolver {
  readonly name = 'local-head';

  constructor(private readonly resolveHead: () => Promise<string>) {}

  async resolveReferenceCommit(): Promise<string> {
    return assertCommit(await this.resolveHead(), 'git rev-parse HEAD');
  }
}

/**
 * Tries each resolver in order and returns the first commit found.
 */
export class FallbackCommitResolver implements CommitResolver {
  readonly name: string;

  constructor(private readonly resolvers: CommitResolver[]) {
    if (resolvers.length === 0) {
      throw new Error('FallbackCommitResolver needs at least one resolver');
    }
    this.name = resolvers.map((resolver) => resolver.name).join(' -> ');
  }

  async resolveReferenceCommit(): Promise<string> {
    const failures: string[] = [];

    for (const resolver of this.resolvers) {
      try {
        return await resolver.resolveReferenceCommit();
      } catch (error) {
        console.warn(`[Commits] ${resolver.name} resolver failed: ${errorMessage(error)}`);
        failures.push(`${resolver.name}: ${errorMessage(error)}`);
      }
    }

    throw new Error(`No resolver produced a commit (${failures.join('; ')})`);
  }
}
