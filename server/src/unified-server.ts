import './env';

import express from 'express';
import { createServer } from 'http';

import { AppConfig, ConfigError, loadConfig } from './lib/config';
import { closePool, getPool } from './lib/db';
import { createReceiverDependencies } from './lib/incoming-email/dependencies';
import { addIncomingEmailJob, createIncomingEmailQueue } from './lib/queue';
import { createRedisConnection } from './lib/redis-connection';
import { RejectionMailer } from './lib/rejection-mailer';
import { createEmailReceiverWorker } from './lib/workers/email-receiver-worker';
import { createIncomingEmailRouter } from './routes/incoming-email';

const SHUTDOWN_TIMEOUT_MS = 10000;

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('Missing required environment variables:');
      error.missing.forEach(v => console.error(`   - ${v}`));
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const config = readConfig();

  const pool = getPool(config.databaseUrl);
  const client = await pool.connect();
  client.release();
  console.log('Connected to PostgreSQL');

  const connection = createRedisConnection(config.redisUrl);
  const queue = createIncomingEmailQueue(connection);
  const worker = createEmailReceiverWorker(connection, {
    receiver: createReceiverDependencies(config, pool),
    notifier: RejectionMailer.fromUrl(config.smtpUrl, config.smtpFrom)
  });

  const app = express();

  app.use((req, _res, next) => {
    if (!req.path.startsWith('/health')) {
      console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    }
    next();
  });

  app.get('/health', async (_req, res) => {
    try {
      await pool.query('SELECT 1');
      res.json({ status: 'healthy', timestamp: new Date().toISOString() });
    } catch (error: unknown) {
      console.error('[Health] Database check failed:', error);
      res.status(503).json({ status: 'unhealthy', timestamp: new Date().toISOString() });
    }
  });

  app.use('/api/incoming-email', createIncomingEmailRouter(config.incomingEmail, raw => addIncomingEmailJob(queue, raw)));

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('Unhandled error:', err);
    if (res.headersSent) return;
    res.status(500).json({ error: 'Internal server error' });
  });

  const server = createServer(app);
  const port = config.port;

  const closeResources = async () => {
    await worker.close();
    await queue.close();
    connection.disconnect();
    await closePool();
  };

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down...`);

    const forceExit = setTimeout(() => {
      console.error('Shutdown timed out, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    server.close(() => {
      console.log('HTTP server closed');
      closeResources()
        .then(() => {
          clearTimeout(forceExit);
          console.log('Shutdown complete');
          process.exit(0);
        })
        .catch((err) => {
          console.error('Error during shutdown:', err);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('uncaughtException', (err) => {
    console.error('Uncaught exception:', err);
    shutdown('uncaughtException');
  });
  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
    shutdown('unhandledRejection');
  });

  server.listen(port, () => {
    console.log(`Server running on port ${port}`);
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      console.error(`Port ${port} already in use`);
    } else {
      console.error('Server error:', error);
    }
    process.exit(1);
  });
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
