import { ClientRequest, IncomingMessage, ServerResponse } from 'http';
import { NextFunction, Request, Response } from 'express';
import { createProxyMiddleware, RequestHandler } from 'http-proxy-middleware';
import { ApiContract, Instance } from '../types.js';
import { OrchestratorError, errorMessage } from '../errors.js';
import { InstanceRegistry } from './registry.js';
import { FetchContractOptions, fetchContract, matchContract } from './contract.js';

// Headers identifying the caller or the hop; `host` is rewritten by changeOrigin
const STRIPPED_HEADERS = [
  'x-forwarded-for',
  'x-forwarded-host',
  'x-forwarded-proto',
  'x-forwarded-port',
  'x-forwarded-prefix',
  'forwarded',
  'x-real-ip',
  'connection',
  'keep-alive',
  'proxy-connection',
  'upgrade',
];

export type ContractFetcher = (port: number, options: FetchContractOptions) => Promise<ApiContract>;

export interface ProxyServiceConfig {
  registry: InstanceRegistry;
  contractPath: string;
  contractFetchTimeoutMs: number;
  allowUnfiltered: boolean;
  upstreamHost?: string;
  fetchContract?: ContractFetcher;
}

interface ForwardTarget {
  origin: string;
  path: string;
}

/**
 * Forwards calls to an instance's agent, but only those its published API
 * document declares.
 */
export class ProxyService {
  private readonly registry: InstanceRegistry;
  private readonly contractPath: string;
  private readonly contractFetchTimeoutMs: number;
  private readonly allowUnfiltered: boolean;
  private readonly upstreamHost: string;
  private readonly fetcher: ContractFetcher;
  private readonly pending = new Map<string, Promise<ApiContract>>();
  private readonly targets = new WeakMap<IncomingMessage, ForwardTarget>();
  private readonly forwarder: RequestHandler<IncomingMessage, ServerResponse>;

  constructor(config: ProxyServiceConfig) {
    this.registry = config.registry;
    this.contractPath = config.contractPath;
    this.contractFetchTimeoutMs = config.contractFetchTimeoutMs;
    this.allowUnfiltered = config.allowUnfiltered;
    this.upstreamHost = config.upstreamHost ?? '127.0.0.1';
    this.fetcher = config.fetchContract ?? fetchContract;

    this.forwarder = createProxyMiddleware<IncomingMessage, ServerResponse>({
      changeOrigin: true,
      xfwd: false,
      router: (req) => this.targetOf(req).origin,
      pathRewrite: (_path, req) => this.targetOf(req).path,
      on: {
        proxyReq: (proxyReq: ClientRequest) => {
          for (const header of STRIPPED_HEADERS) {
            proxyReq.removeHeader(header);
          }
        },
        error: (error, req, res) => {
          console.warn(`[Proxy] Upstream request ${req.method} ${req.url} failed: ${error.message}`);
          if (res instanceof ServerResponse && !res.headersSent) {
            res.writeHead(502, { 'Content-Type': 'application/json' });
            res.end(JSON.stringify({ error: `Agent did not answer: ${error.message}`, kind: 'UpstreamUnavailable' }));
          } else {
            res.destroy();
          }
        },
      },
    });
  }

  /**
   * Resolves the instance and checks `method path` against its contract.
   * Returns the upstream origin the call may be sent to.
   */
  async authorize(correlationId: string, method: string, path: string): Promise<ForwardTarget> {
    const instance = this.registry.require(correlationId);
    if (instance.status !== 'running') {
      throw new OrchestratorError('UpstreamUnavailable', `Instance ${correlationId} is ${instance.status}`);
    }

    const contract = await this.contractFor(instance);
    if (contract) {
      const match = matchContract(contract, method, path);
      if (!match.allowed) {
        const detail =
          match.reason === 'method-not-allowed'
            ? `method ${method} is not allowed (allowed: ${match.allowedMethods.join(', ')})`
            : 'path is not part of the agent API';
        throw new OrchestratorError('RequestRejected', `Rejected ${method} ${path}: ${detail}`);
      }
    }

    return { origin: `http://${this.upstreamHost}:${instance.port}`, path };
  }

  /**
   * Express handler for a proxied call; `path` is the upstream path with its
   * query string.
   */
  async forward(req: Request, res: Response, next: NextFunction, correlationId: string, path: string): Promise<void> {
    const target = await this.authorize(correlationId, req.method, path);
    this.targets.set(req, target);
    await this.forwarder(req, res, next);
  }

  private targetOf(req: IncomingMessage): ForwardTarget {
    const target = this.targets.get(req);
    if (!target) {
      throw new Error(`No proxy target recorded for ${req.method} ${req.url}`);
    }
    return target;
  }

  private async contractFor(instance: Instance): Promise<ApiContract | null> {
    if (instance.apiContract) {
      return instance.apiContract;
    }

    // Keyed by creation time so a recreated instance never gets its predecessor's contract
    const key = `${instance.correlationId}@${instance.createdAt.getTime()}`;
    let pending = this.pending.get(key);
    if (!pending) {
      pending = this.fetcher(instance.port, {
        host: this.upstreamHost,
        path: this.contractPath,
        timeoutMs: this.contractFetchTimeoutMs,
      })
        .then((contract) => {
          const current = this.registry.get(instance.correlationId);
          if (current && current.createdAt.getTime() === instance.createdAt.getTime()) {
            this.registry.setContract(instance.correlationId, contract);
          }
          console.log(`[Proxy] Loaded ${contract.operations.length} operations for ${instance.correlationId}`);
          return contract;
        })
        .finally(() => {
          this.pending.delete(key);
        });
      this.pending.set(key, pending);
    }

    try {
      return await pending;
    } catch (error) {
      if (this.allowUnfiltered) {
        console.warn(`[Proxy] Forwarding unfiltered for ${instance.correlationId}: ${errorMessage(error)}`);
        return null;
      }
      throw error;
    }
  }
}
