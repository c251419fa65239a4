import express, { Express } from 'express';
import cors from 'cors';
import { createMetricsRouter, MetricsRouteDeps } from './routes/metrics';
import { omitNulls } from './utils/json';
import { isLocalNetworkOrigin } from './utils/localNetwork';
import { log } from './utils/logger';

export interface AppOptions {
  allowLocalNetworkCors: boolean;
  staticDir: string | null;
}

/**
 * Build the Express app. No listener is bound here; index.ts (or a test) owns the server.
 */
export function createApp(deps: MetricsRouteDeps, options: AppOptions): Express {
  const app = express();

  // Absent readings are left out of every JSON response
  app.set('json replacer', omitNulls);

  // Same-origin only unless local-network access is switched on
  if (options.allowLocalNetworkCors) {
    app.use(
      cors({
        origin: (origin, callback) => {
          callback(null, origin === undefined || isLocalNetworkOrigin(origin));
        },
      })
    );
    log.info('CORS enabled for local network origins', 'app');
  }

  app.use('/api', createMetricsRouter(deps));

  if (options.staticDir) {
    app.use(express.static(options.staticDir));
    log.info(`Serving dashboard from ${options.staticDir}`, 'app');
  }

  return app;
}
