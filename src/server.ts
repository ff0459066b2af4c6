import express, { Application } from 'express';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadContent, LoadResult } from './loader.js';
import { createApiRoutes } from './routes/api.js';
import { ConversionDefaults, getServerPort, loadConfig } from './config.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Create and configure the Express application
 */
export function createApp(data: LoadResult, defaults?: ConversionDefaults): Application {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '5mb' }));

  // API routes
  app.use('/api', createApiRoutes(data, defaults));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      documents: data.corpus.size
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
  const config = await loadConfig();

  const args = process.argv.slice(2);
  const portArg = args.find(a => a.startsWith('--port='));
  const port = portArg ? parseInt(portArg.split('=')[1], 10) : getServerPort();

  // Relative content directories are resolved from the project root
  const contentDir = path.resolve(__dirname, '..', config.contentDir);

  console.log(`Loading content from: ${contentDir}`);
  const data = loadContent({ contentDir });

  console.log(`Loaded ${data.corpus.size} documents`);

  if (data.errors.length > 0) {
    console.warn('Warnings:', data.errors);
  }

  const app = createApp(data, config.conversion);

  const server = app.listen(port, () => {
    console.log(`vimdocgen API listening on http://localhost:${port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Only start listening when run directly, not when imported by tests
if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  bootstrap().catch(err => {
    console.error('Failed to start server', err);
    process.exit(1);
  });
}
