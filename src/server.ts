import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { WebSocketServer } from 'ws';
import { createContainer, Container, ContainerOverrides } from './container';
import { createTaskRoutes } from './api/taskRoutes';
import { createGenerationRoutes } from './api/generationRoutes';
import { WebSocketBridge } from './infrastructure/websocket/WebSocketBridge';
import { AppError } from './domain/common/Errors';

/**
 * Build the Express app over an initialized container.
 */
export function createApp(container: Container): Express {
  const { config, logger, taskManager, sse } = container;

  const app = express();

  if (config.cors.enabled) {
    app.use(cors({
      origin: config.cors.origins.includes('*') ? true : config.cors.origins,
      credentials: config.cors.credentials,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Last-Event-ID'],
    }));
  }
  app.use(express.json({ limit: '1mb' }));

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: Date.now(),
      uptime: process.uptime(),
      generator: container.generator.name
    });
  });

  app.use('/api', createGenerationRoutes(taskManager, sse));
  app.use('/api', createTaskRoutes(taskManager, sse));

  // Global error handling middleware
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    logger.error('Server error:', err);

    if (res.headersSent) {
      return next(err);
    }

    if (err instanceof AppError) {
      return res.status(err.statusCode).json(err.toJSON());
    }

    // express.json() parse failures carry a 4xx status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    res.status(status).json({
      error: true,
      message: err.message,
      code: status < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR'
    });
  });

  return app;
}

export interface RunningServer {
  app: Express;
  server: Server;
  wss: WebSocketServer;
  bridge: WebSocketBridge;
  container: Container;
  close(): Promise<void>;
}

/**
 * Initialize the container and listen on the configured port.
 */
export async function startServer(overrides: ContainerOverrides = {}): Promise<RunningServer> {
  const container = await createContainer(overrides);
  await container.initialize();

  const { config, logger } = container;
  const app = createApp(container);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.port, config.host, () => resolve(listening));
    listening.once('error', reject);
  });

  // WebSocket server shares the HTTP port
  const wss = new WebSocketServer({ server });
  const bridge = new WebSocketBridge(wss, container.eventBus, container.checkpointStore, logger.child({ component: 'ws' }));

  logger.info(`Server listening on ${config.host}:${config.port}`);
  logger.debug(config.toString());

  const close = async (): Promise<void> => {
    bridge.close();
    wss.clients.forEach(client => {
      client.close();
    });
    await new Promise<void>(resolve => wss.close(() => resolve()));

    await container.shutdown();

    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
  };

  return { app, server, wss, bridge, container, close };
}

function installSignalHandlers(running: RunningServer): void {
  let isShuttingDown = false;

  const onSignal = (signal: NodeJS.Signals) => {
    if (isShuttingDown) {
      process.exit(1);
    }
    isShuttingDown = true;
    running.container.logger.info(`Received ${signal}, shutting down`);

    const forceExitTimeout = setTimeout(() => {
      process.exit(1);
    }, 5000);

    running.close().then(
      () => {
        clearTimeout(forceExitTimeout);
        process.exit(0);
      },
      (err: unknown) => {
        running.container.logger.error('Shutdown failed', err instanceof Error ? err : undefined);
        clearTimeout(forceExitTimeout);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

if (require.main === module) {
  startServer()
    .then(installSignalHandlers)
    .catch((err: unknown) => {
      console.error('Failed to start server:', err);
      process.exit(1);
    });
}
