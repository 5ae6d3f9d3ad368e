import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { eventStorePlugin } from './infrastructure/index.js';
import type { EventStorePluginOptions } from './infrastructure/index.js';
import {
  simulationRoutes,
  replayRoutes,
  maintenanceRoutes,
} from './interfaces/http/index.js';

export interface BuildServerOptions extends EventStorePluginOptions {
  /** `false` silences the request logger (tests). */
  logger?: boolean;
}

/**
 * Assembles the Fastify app without listening.
 *
 * Order:
 * 1) Event store plugin (backend connection + services)
 * 2) HTTP routes
 */
export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const { logger = true, ...pluginOptions } = options;

  const fastify = Fastify({
    logger: logger ? { level: pluginOptions.config.logLevel } : false,
  });

  await fastify.register(eventStorePlugin, pluginOptions);

  await fastify.register(simulationRoutes);
  await fastify.register(replayRoutes);
  await fastify.register(maintenanceRoutes);

  return fastify;
}
