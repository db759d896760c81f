/**
 * ETF STRATEGY MODULE
 *
 * Composition root: config → transport → sources → provider → service.
 */

import type { FastifyInstance } from 'fastify';
import type { Env } from '../../config/env.js';
import type { Logger } from '../../common/logger.js';
import {
  buildNetworkConfig,
  createHttpTransport,
  RateLimiterPool,
  type HttpTransport,
} from '../network/index.js';
import { DataProvider } from './data-provider.js';
import { registerEtfStrategyRoutes } from './etf-strategy.routes.js';
import { EtfStrategyService } from './etf-strategy.service.js';
import { createDefaultSourceRegistry, type SourceRegistry } from './sources/source.registry.js';
import { loadStrategyConfig, type StrategyConfig } from './strategy.config.js';

export interface EtfStrategyModule {
  config: StrategyConfig;
  registry: SourceRegistry;
  service: EtfStrategyService;
  limiter: RateLimiterPool;
}

export interface CreateEtfStrategyModuleOptions {
  env: Env;
  logger?: Logger;
  config?: StrategyConfig;
  transport?: HttpTransport;
  registry?: SourceRegistry;
  clock?: () => Date;
}

export function createEtfStrategyModule(options: CreateEtfStrategyModuleOptions): EtfStrategyModule {
  const { env, logger } = options;
  const config = options.config ?? loadStrategyConfig(env.STRATEGY_CONFIG_PATH);
  const network = buildNetworkConfig(env);
  const limiter = new RateLimiterPool();

  const registry = options.registry ?? createDefaultSourceRegistry({
    transport: options.transport ?? createHttpTransport(network),
    network,
    limiter,
  });

  const dataProvider = new DataProvider({ registry, logger, clock: options.clock });
  const service = new EtfStrategyService({
    config,
    dataProvider,
    defaultMode: env.DATA_MODE,
    logger,
    clock: options.clock,
  });

  return { config, registry, service, limiter };
}

export async function registerEtfStrategyModule(
  fastify: FastifyInstance,
  module: EtfStrategyModule,
): Promise<void> {
  await registerEtfStrategyRoutes(fastify, { service: module.service, registry: module.registry });

  fastify.addHook('onClose', async () => {
    await module.limiter.disconnect();
  });
}

export { EtfStrategyService } from './etf-strategy.service.js';
export { DataProvider } from './data-provider.js';
export { renderReportMarkdown } from './etf-strategy.renderer.js';
export * from './etf.types.js';
export * from './strategy.config.js';
