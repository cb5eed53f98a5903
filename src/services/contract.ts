import { z } from 'zod/v4';
import { ApiContract, ContractOperation } from '../types.js';
import { OrchestratorError, errorMessage } from '../errors.js';

const HTTP_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'] as const;

const openApiDocumentSchema = z.object({
  info: z
    .object({
      title: z.string().optional(),
      version: z.string().optional(),
    })
    .optional(),
  paths: z.record(z.string(), z.record(z.string(), z.unknown())),
});

// One path segment, never `.` or `..`
const SEGMENT = '(?!\\.\\.?(?:/|$))[^/]+';

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compiles an OpenAPI path template such as `/session/{id}/message` into an
 * anchored pattern where each `{param}` matches exactly one segment.
 */
export function templateToRegex(template: string): RegExp {
  let source = '';
  let lastIndex = 0;

  for (const match of template.matchAll(/\{[^}/]+\}/g)) {
    const index = match.index ?? lastIndex;
    source += escapeRegex(template.slice(lastIndex, index)) + SEGMENT;
    lastIndex = index + match[0].length;
  }
  source += escapeRegex(template.slice(lastIndex));

  return new RegExp(`^${source}$`);
}

export function parseContract(document: unknown): ApiContract {
  const parsed = openApiDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new OrchestratorError('ContractUnavailable', `Invalid API document: ${parsed.error.message}`);
  }

  const operations: ContractOperation[] = [];
  for (const [template, item] of Object.entries(parsed.data.paths)) {
    const pattern = templateToRegex(template);
    for (const method of HTTP_METHODS) {
      if (method in item) {
        operations.push({ method: method.toUpperCase(), template, pattern });
      }
    }
  }

  return {
    title: parsed.data.info?.title,
    version: parsed.data.info?.version,
    operations,
    fetchedAt: new Date(),
  };
}

export type ContractMatch =
  | { allowed: true; operation: ContractOperation }
  | { allowed: false; reason: 'path-not-found' }
  | { allowed: false; reason: 'method-not-allowed'; allowedMethods: string[] };

/**
 * Strips the query string and percent-decoding from a request path. Returns
 * null for a path that cannot be decoded or that has `.` or `..` segments.
 */
export function normalizeRequestPath(path: string): string | null {
  const withoutQuery = path.split(/[?#]/, 1)[0] ?? '';
  let decoded: string;
  try {
    decoded = decodeURIComponent(withoutQuery);
  } catch {
    return null;
  }
  const normalized = decoded.startsWith('/') ? decoded : `/${decoded}`;
  if (normalized.split('/').some((segment) => segment === '.' || segment === '..')) {
    return null;
  }
  return normalized;
}

export function matchContract(contract: ApiContract, method: string, path: string): ContractMatch {
  const normalized = normalizeRequestPath(path);
  if (normalized === null) {
    return { allowed: false, reason: 'path-not-found' };
  }

  const candidates = contract.operations.filter((operation) => operation.pattern.test(normalized));
  if (candidates.length === 0) {
    return { allowed: false, reason: 'path-not-found' };
  }

  const operation = candidates.find((candidate) => candidate.method === method);
  if (!operation) {
    return {
      allowed: false,
      reason: 'method-not-allowed',
      allowedMethods: Array.from(new Set(candidates.map((candidate) => candidate.method))).sort(),
    };
  }

  return { allowed: true, operation };
}

export interface FetchContractOptions {
  host?: string;
  path?: string;
  timeoutMs?: number;
}

export async function fetchContract(port: number, options: FetchContractOptions = {}): Promise<ApiContract> {
  const url = `http://${options.host ?? '127.0.0.1'}:${port}${options.path ?? '/doc'}`;
  const timeoutMs = options.timeoutMs ?? 5000;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  let document: unknown;
  try {
    const response = await fetch(url, { signal: controller.signal });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }
    document = await response.json();
  } catch (error) {
    const reason = error instanceof Error && error.name === 'AbortError' ? `no answer within ${timeoutMs}ms` : errorMessage(error);
    throw new OrchestratorError('ContractUnavailable', `Failed to fetch API document from ${url}: ${reason}`, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }

  return parseContract(document);
}
