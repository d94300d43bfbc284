import Fastify, { type FastifyServerOptions } from 'fastify';
import { registerCombinedRoutes } from './routes/combined';
import { CombinedHandler } from './combined/handler';
import { getProductService } from './catalog';
import type { ProductService } from './catalog/provider';

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  /**
   * Replaces the process-wide product service (tests).
   */
  productService?: ProductService;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? false });

  app.get('/health', async () => ({ status: 'ok' }));

  const handler = new CombinedHandler(options.productService ?? getProductService());
  await registerCombinedRoutes(app, handler);
  return app;
}
