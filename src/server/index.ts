import express from 'express';
import { createServer } from 'http';
import client from 'prom-client';
import { config } from './config';
import { logger } from './utils/logger';
import { getMetricsService } from './services/MetricsService';
import { CharacterPackService } from './services/CharacterPackService';
import { FileSnapshotStore } from './services/SnapshotStore';
import { loadGameConfigs } from './game/GameConfigLoader';
import { GameSessionManager } from './game/GameSessionManager';
import { TextBoardRenderer } from './rendering/TextBoardRenderer';
import { SocketChatTransport } from './websocket/server';
import { errorMessage, isFatalError } from '../shared/errors';
import { GAME_TYPES } from '../shared/types/session';

const app = express();
const server = createServer(app);

// Register default Prometheus metrics for the Node.js process.
client.collectDefaultMetrics();

// Initialize MetricsService singleton (registers all custom metrics)
const metricsService = getMetricsService();

const transport = new SocketChatTransport(server, {
  corsOrigin: config.server.corsOrigin,
  botName: config.bot.name,
});

let sessionManager: GameSessionManager | null = null;

/**
 * Liveness probe endpoint - /health or /healthz
 */
app.get(['/health', '/healthz'], (_req, res) => {
  res.status(200).json({
    status: sessionManager ? 'ok' : 'starting',
    version: config.app.version,
    uptimeSeconds: Math.round(process.uptime()),
    activeSessions: sessionManager?.activeSessionCount ?? 0,
  });
});

if (config.metrics.enabled) {
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', metricsService.getContentType());
      const metrics = await metricsService.getMetrics();
      res.send(metrics);
    } catch (err) {
      logger.error('Failed to generate /metrics payload', {
        error: errorMessage(err),
      });
      res.status(500).send('metrics_unavailable');
    }
  });
}

// 404 handler
app.use((_req, res) => {
  res.status(404).json({
    success: false,
    error: {
      message: 'Route not found',
      code: 'NOT_FOUND',
      timestamp: new Date(),
    },
  });
});

async function startServer(): Promise<void> {
  try {
    for (const warning of config.warnings) {
      logger.warn(warning);
    }

    const boards = await loadGameConfigs(config.resources.gameConfigDir);

    const characters = new CharacterPackService({
      repoDir: config.resources.charactersRepoDir,
      botName: config.bot.name,
      availableGames: [...GAME_TYPES],
    });
    await characters.init();

    sessionManager = new GameSessionManager({
      transport,
      renderer: new TextBoardRenderer(),
      store: new FileSnapshotStore({
        rootDir: config.persistence.snapshotDir,
        autosaveSlots: config.persistence.autosaveSlots,
      }),
      boards,
      catalog: characters,
      gameChannelIds: config.bot.gameChannelIds,
      adminIds: config.bot.adminIds,
      autosaveEvery: config.persistence.autosaveEvery,
      showFaces: characters.alwaysShowFacesOnBoard,
    });
    const manager = sessionManager;
    transport.onInboundEvent((event) => manager.handleInboundEvent(event));

    const PORT = config.server.port;
    server.listen(PORT, config.server.host, () => {
      logger.info(`Server running on port ${PORT}`);
      logger.info(`Environment: ${config.nodeEnv}`);
      logger.info('Bot ready', {
        botName: config.bot.name,
        testMode: config.bot.testMode,
        games: manager.availableGames(),
        gameChannels: config.bot.gameChannelIds.length > 0 ? config.bot.gameChannelIds : 'any',
        characters: characters.getCharacters().length,
      });
    });

    // Graceful shutdown
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM', characters));
    process.on('SIGINT', () => gracefulShutdown('SIGINT', characters));
  } catch (error) {
    logger.error('Failed to start server', {
      error: errorMessage(error),
      fatal: isFatalError(error),
    });
    process.exit(1);
  }
}

function gracefulShutdown(signal: string, characters: CharacterPackService): void {
  logger.info(`Received ${signal}. Starting graceful shutdown...`);

  characters.teardown();
  transport
    .close()
    .catch((error: unknown) => logger.warn('Socket server close failed', { error: errorMessage(error) }))
    .finally(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

  // Force close after 30 seconds
  setTimeout(() => {
    logger.error('Could not close connections in time, forcefully shutting down');
    process.exit(1);
  }, 30000).unref();
}

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason: errorMessage(reason) });
  process.exit(1);
});

// Start the server
void startServer();

export { app, server };
