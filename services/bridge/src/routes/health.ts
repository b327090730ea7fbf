import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    try {
      await ctx.client.readProperty(ctx.snapshot.deviceObjectId, 'object-name', {
        timeoutMs: ctx.config.gateway.pointTimeoutMs
      });
      ctx.readiness.gateway = true;
    } catch (error) {
      request.log.warn({ err: error }, 'Gateway readiness probe failed');
      ctx.readiness.gateway = false;
    }

    const components: Record<string, boolean> = {
      gateway: ctx.readiness.gateway
    };
    ctx.metrics.readinessGauge.set({ component: 'gateway' }, ctx.readiness.gateway ? 1 : 0);

    if (!ctx.readiness.gateway) {
      return reply.status(503).send({ status: 'not_ready', components });
    }
    return { status: 'ready', components };
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', ctx.metrics.register.contentType);
    return ctx.metrics.register.metrics();
  });
};
