import express, { Router, Request, Response, NextFunction } from 'express';
import { chatTranscriptSchema, setupRequestSchema, toDescriptor } from '../types.js';
import { OrchestratorError } from '../errors.js';
import { Orchestrator } from '../services/orchestrator.js';
import { ProxyService } from '../services/proxy.js';
import { OrphanReaper } from '../services/reaper.js';
import { createRateLimiter } from '../middleware/rate-limit.js';

export interface InstanceRouteOptions {
  proxyDeleteLimit: number;
  proxyDeleteWindowMs: number;
}

/**
 * Upstream path (with query) of a proxied call, taken either from the URL
 * after `/proxy` or from its `path` query parameter.
 */
export function upstreamPathOf(req: Request): string {
  const url = new URL(req.originalUrl, 'http://localhost');
  const match = url.pathname.slice(req.baseUrl.length).match(/^\/[^/]+\/proxy(\/.*)?$/);
  const rest = match?.[1];
  const target = url.searchParams.get('path');

  if (rest && !(rest === '/' && target)) {
    return rest + url.search;
  }
  if (!target) {
    throw new OrchestratorError('InvalidRequest', 'Missing proxy path');
  }

  url.searchParams.delete('path');
  const path = target.startsWith('/') ? target : `/${target}`;
  const query = url.searchParams.toString();
  if (!query) {
    return path;
  }
  return `${path}${path.includes('?') ? '&' : '?'}${query}`;
}

export function createInstanceRoutes(
  orchestrator: Orchestrator,
  proxy: ProxyService,
  reaper: OrphanReaper,
  options: InstanceRouteOptions
): Router {
  const router = Router();
  // Proxy routes must see the raw body stream, so JSON parsing is per route
  const json = express.json({ limit: '1mb' });

  const setup = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = setupRequestSchema.parse(req.body ?? {});
      const response = await orchestrator.setup({
        correlationId: body.correlation_id,
        sourceCommit: body.source_commit,
        incident: body.incident,
      });
      res.json(response);
    } catch (error) {
      next(error);
    }
  };

  router.post('/setup', json, setup);
  router.post('/', json, setup);

  router.get('/', (req, res) => {
    res.json({ instances: orchestrator.list().map(toDescriptor) });
  });

  router.post('/reap', async (req, res, next) => {
    try {
      res.json(await reaper.runOnce());
    } catch (error) {
      next(error);
    }
  });

  router.get('/:correlationId', (req, res, next) => {
    const instance = orchestrator.get(req.params.correlationId);
    if (!instance) {
      next(new OrchestratorError('InstanceNotFound', `No instance for correlation id ${req.params.correlationId}`));
      return;
    }
    res.json({ ...toDescriptor(instance), incident: instance.incident ?? null });
  });

  router.post('/:correlationId/chat', json, async (req, res, next) => {
    try {
      const transcript = chatTranscriptSchema.parse(req.body);
      const record = await orchestrator.saveChat(req.params.correlationId, transcript);
      res.status(201).json({ status: 'chat_saved', id: record.id });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:correlationId/chats', async (req, res, next) => {
    try {
      const chats = await orchestrator.listChats(req.params.correlationId);
      res.json({
        chats: chats.map((chat) => ({ id: chat.id, saved_at: chat.savedAt.toISOString(), transcript: chat.transcript })),
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:correlationId', async (req, res, next) => {
    try {
      await orchestrator.delete(req.params.correlationId);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  router.all(
    ['/:correlationId/proxy', '/:correlationId/proxy/*'],
    createRateLimiter({
      limit: options.proxyDeleteLimit,
      windowMs: options.proxyDeleteWindowMs,
      methods: ['DELETE'],
    }),
    async (req, res, next) => {
      try {
        await proxy.forward(req, res, next, req.params.correlationId, upstreamPathOf(req));
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
