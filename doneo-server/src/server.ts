import { WebSocketServer } from 'ws';
import { createContainer } from './container';
import { createApp } from './app';
import { WebSocketBridge } from './infrastructure/websocket/WebSocketBridge';

const FORCE_EXIT_MS = 5000;

async function startServer() {
  const container = createContainer();
  await container.initialize();

  const { config, logger, eventBus, projectService, chatService } = container;
  logger.debug(config.toString());

  const app = createApp({ projectService, chatService, logger, cors: config.cors });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Doneo server listening on http://${config.host}:${config.port}`, {
      dataDir: config.dataDir,
      nodeEnv: config.nodeEnv
    });
  });

  // Live feed: every domain event is pushed to subscribed sockets
  const wss = new WebSocketServer({ server });
  const bridge = new WebSocketBridge(wss, eventBus, logger);

  app.get('/ws-status', (req, res) => {
    res.json({
      connectedClients: bridge.getClientCount(),
      clients: bridge.getClientStatus()
    });
  });

  let stopping = false;
  const stop = async (signal: NodeJS.Signals) => {
    if (stopping) {
      process.exit(1);
    }
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);

    const forceExit = setTimeout(() => process.exit(1), FORCE_EXIT_MS);

    try {
      wss.clients.forEach(client => client.close());
      wss.close();
      await container.shutdown();
      server.close(() => {
        clearTimeout(forceExit);
        process.exit(0);
      });
    } catch (err) {
      logger.error('Shutdown failed:', err instanceof Error ? err : new Error(String(err)));
      clearTimeout(forceExit);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void stop('SIGINT'));
  process.on('SIGTERM', () => void stop('SIGTERM'));

  return { app, server, container };
}

startServer().catch(err => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
