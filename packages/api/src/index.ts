import express, { type Express } from 'express';
import cors from 'cors';
import * as trpcExpress from '@trpc/server/adapters/express';
import {
  createConsoleLogger,
  createPagewright,
  loadConfig,
  type AssetLibrary,
  type DefinitionCatalog,
  type Logger,
  type PageLifecycleManager,
  type PageRenderer,
} from '@pagewright/core';
import { createAppRouter } from './routes/index.js';
import { createPreviewRouter } from './routes/preview.js';

export interface ApiServices {
  lifecycle: PageLifecycleManager;
  catalog: DefinitionCatalog;
  renderer: PageRenderer;
  assets: AssetLibrary;
  logger: Logger;
}

export interface ServerOptions {
  port?: number;
  host?: string;
  /** Services to serve; built from the environment when omitted */
  services?: ApiServices;
}

/**
 * Create and configure the Express app without starting the server.
 * Useful for testing or embedding in other servers.
 */
export function createApp(services: ApiServices): Express {
  const appRouter = createAppRouter(services.lifecycle, services.catalog, services.assets);

  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // HTML previews
  app.use(createPreviewRouter(services.lifecycle, services.renderer, services.logger));

  // tRPC endpoint
  app.use(
    '/trpc',
    trpcExpress.createExpressMiddleware({
      router: appRouter,
      onError: ({ path, error }) => {
        if (error.code === 'INTERNAL_SERVER_ERROR') {
          services.logger.error(`tRPC ${path ?? '(unknown)'} failed`, error.message);
        }
      },
    })
  );

  return app;
}

/**
 * Start the Pagewright API server.
 * Can be imported and called from the CLI.
 */
export async function startServer(options: ServerOptions = {}): Promise<void> {
  const config = loadConfig();
  const port = options.port ?? config.port;
  const host = options.host ?? config.host;
  const services = options.services ?? createPagewright({ config, logger: createConsoleLogger('[pagewright-api]') });

  const app = createApp(services);

  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      services.logger.info(`Pagewright API running at http://${host}:${port}`);
      services.logger.info(`  tRPC endpoint: http://${host}:${port}/trpc`);
      services.logger.info(`  Previews: http://${host}:${port}/preview/index`);
      resolve();
    });
  });
}

// Run directly if this is the main module
const isMainModule = import.meta.url === `file://${process.argv[1]}`;
if (isMainModule) {
  startServer().catch((err) => {
    console.error('Failed to start server:', err);
    process.exit(1);
  });
}

export { createAppRouter } from './routes/index.js';
export type { AppRouter } from './routes/index.js';
export { toTRPCError, httpStatusFor } from './errors.js';
