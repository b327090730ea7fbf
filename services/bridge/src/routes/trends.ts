import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { AppContext } from '../types';
import { mapErrorToResponse } from '../errors';
import type { TrendOutcome, TrendStats } from '../trends/pipeline';
import { toTrendErrorBody, toTrendResponse } from '../trends/response';

// Repeated parameters arrive as an array; the first one wins.
const trendQuerySchema = z.object({
  range: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) => (Array.isArray(value) ? value[0] : value))
});

const recordStats = (ctx: AppContext, stats: TrendStats) => {
  if (stats.pagesFetched > 0) {
    ctx.metrics.trendPages.inc(stats.pagesFetched);
  }
  for (const [reason, count] of Object.entries(stats.skipped)) {
    if (count) {
      ctx.metrics.trendRecordsSkipped.inc({ reason }, count);
    }
  }
};

const recordReadiness = (ctx: AppContext, outcome: TrendOutcome) => {
  if (outcome.ok) {
    ctx.readiness.gateway = true;
  } else if (outcome.failure.code.startsWith('GATEWAY_')) {
    ctx.readiness.gateway = false;
  } else {
    return;
  }
  ctx.metrics.readinessGauge.set({ component: 'gateway' }, ctx.readiness.gateway ? 1 : 0);
};

export const registerTrendRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/api/trends', async (request, reply) => {
    const parseResult = trendQuerySchema.safeParse(request.query);
    if (!parseResult.success) {
      const mapped = mapErrorToResponse(parseResult.error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }

    // Stop paging the gateway once the dashboard has gone away.
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    };
    reply.raw.once('close', onClose);

    const endTimer = ctx.metrics.trendDuration.startTimer();
    let outcome: TrendOutcome;
    try {
      outcome = await ctx.pipeline.run(parseResult.data.range, {
        signal: controller.signal,
        logger: request.log
      });
    } finally {
      reply.raw.off('close', onClose);
    }

    const stats = outcome.ok ? outcome.result.stats : outcome.failure.stats;
    const rangeKey = outcome.ok ? outcome.result.range.key : outcome.failure.range.key;
    endTimer({ range: rangeKey });
    recordStats(ctx, stats);
    recordReadiness(ctx, outcome);

    if (!outcome.ok) {
      ctx.metrics.trendRequests.inc({ range: rangeKey, result: outcome.failure.code });
      return reply.status(outcome.failure.statusCode).send(toTrendErrorBody(outcome.failure));
    }

    ctx.metrics.trendRequests.inc({ range: rangeKey, result: outcome.result.stats.truncated ? 'partial' : 'ok' });
    return toTrendResponse(outcome.result);
  });
};
