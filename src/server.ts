import express, { Application } from 'express';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadPrototypes, LoadResult } from './loader.js';
import { createApiRoutes } from './routes/api.js';
import { loadConfig, parsePort } from './config.js';
import { consoleReporter } from './reporter.js';

/**
 * Create and configure the Express application
 */
export function createApp(data: LoadResult): Application {
  const app = express();

  app.use('/api', createApiRoutes(data));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      prototypes: data.prototypes.size,
      files: data.files.length
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

/**
 * Start the server
 */
async function bootstrap(): Promise<void> {
  const args = process.argv.slice(2);
  const config = await loadConfig();

  const portArg = args.find(a => a.startsWith('--port='));
  const port = portArg ? parsePort(portArg.split('=')[1], '--port') : config.port;

  const dirArg = args.find(a => a.startsWith('--dir='));
  const rootDir = path.resolve(dirArg ? dirArg.slice('--dir='.length) : process.cwd());

  consoleReporter.info(`Loading prototypes from: ${rootDir}`);
  const data = loadPrototypes({ rootDir, extensions: config.extensions });

  consoleReporter.info(`Loaded ${data.files.length} files, ${data.prototypes.size} prototypes`);

  if (data.errors.length > 0) {
    consoleReporter.warn(`Warnings:\n${data.errors.join('\n')}`);
  }

  const app = createApp(data);

  const server = app.listen(port, () => {
    consoleReporter.info(`Prototype API listening on http://localhost:${port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    consoleReporter.info(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      consoleReporter.info('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      consoleReporter.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

const entry = process.argv[1];
if (entry && fs.realpathSync(entry) === fileURLToPath(import.meta.url)) {
  bootstrap().catch(err => {
    consoleReporter.error(`Failed to start: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
}
