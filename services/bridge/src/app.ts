import cors from '@fastify/cors';
import fastify, { type FastifyInstance } from 'fastify';

import { GatewayClient, type GatewayReader } from '@thermobridge/gateway-client';

import type { BridgeConfig } from './config/serviceConfig';
import { mapErrorToResponse } from './errors';
import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { SnapshotReader } from './points/snapshot';
import { registerHealthRoutes } from './routes/health';
import { registerThermostatRoutes } from './routes/thermostat';
import { registerTrendRoutes } from './routes/trends';
import { TrendPipeline } from './trends/pipeline';
import type { AppContext } from './types';

interface CreateAppOptions {
  /** Replaces the HTTP gateway client, e.g. with an in-memory fake. */
  client?: GatewayReader;
  clock?: () => Date;
}

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export const createGatewayClient = (config: BridgeConfig): GatewayClient =>
  new GatewayClient({
    baseUrl: config.gateway.baseUrl,
    apiRoot: config.gateway.apiRoot,
    site: config.gateway.site,
    device: config.gateway.device,
    username: config.gateway.username,
    password: config.gateway.password,
    userAgent: config.gateway.userAgent,
    timeoutMs: config.gateway.trendTimeoutMs,
    maxPages: config.trend.maxPages
  });

export const createApp = async (config: BridgeConfig, options: CreateAppOptions = {}): Promise<CreateAppResult> => {
  const app = fastify({ logger: createLogger(config.logLevel) });
  await app.register(cors, { origin: config.corsOrigin });

  const metrics = createMetrics();
  metrics.readinessGauge.set({ component: 'gateway' }, 0);

  const client = options.client ?? createGatewayClient(config);

  const pipeline = new TrendPipeline({
    client,
    trendLogInstance: config.trend.logInstance,
    expectedIntervalMs: config.trend.expectedIntervalMs,
    maxGapSteps: config.trend.maxGapSteps,
    maxDisplayPoints: config.trend.maxDisplayPoints,
    maxPages: config.trend.maxPages,
    timeoutMs: config.gateway.trendTimeoutMs,
    logger: app.log,
    clock: options.clock
  });

  const snapshot = new SnapshotReader({
    client,
    points: config.points,
    device: config.gateway.device,
    useDualSetpoints: config.useDualSetpoints,
    timeoutMs: config.gateway.pointTimeoutMs,
    logger: app.log,
    clock: options.clock,
    onRead: (point, outcome) => metrics.pointReads.inc({ point, outcome })
  });

  const ctx: AppContext = {
    config,
    client,
    pipeline,
    snapshot,
    metrics,
    readiness: { gateway: false }
  };

  registerHealthRoutes(app, ctx);
  registerTrendRoutes(app, ctx);
  registerThermostatRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
  });

  return { app, ctx };
};
