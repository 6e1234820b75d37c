/**
 * Application Entry Point
 *
 * Boot sequence: load configuration, build the application, register
 * middleware and routes, then serve until interrupted.
 */

import {
  Application,
  Router,
  cors,
  defineHandler,
  json,
  loadConfig,
  requestLogger,
  text,
} from './framework/mod.ts';

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig();

  // 2. Create application instance
  const app = new Application({ config });

  // 3. Register global middleware
  app.use(requestLogger({ logger: app.logger }));
  app.use(cors());

  // 4. Register routes
  app.get('/', () => text('switchyard is running'));
  app.get('/health', () => json({ status: 'ok' }));

  const files = new Router({ prefix: '/files' });
  files.get('/{path:multipath}', defineHandler(['path'], (params) => json({ path: params.path })));
  app.include(files, '/api');

  // 5. Start server
  await app.listen();

  const stop = () => {
    app.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        app.logger.error('Shutdown failed', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}

main().catch((error: unknown) => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
