import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';
import { describeConfig } from '../config/serviceConfig';

export const registerThermostatRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/api/thermostat', async (request) => ctx.snapshot.read({ logger: request.log }));

  app.get('/api/debug', async (request) => ({
    configuration: describeConfig(ctx.config),
    raw_values: await ctx.snapshot.readRaw({ logger: request.log })
  }));
};
