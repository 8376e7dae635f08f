import { createServer } from 'http';
import { config } from './config';
import { logger } from './utils/logger';
import { createApp } from './app';
import { checkDatabaseHealth, connectDatabase, disconnectDatabase } from './database/connection';
import { InMemoryUserRepository, type UserRepository } from './database/UserRepository';
import { PostgresUserRepository } from './database/PostgresUserRepository';
import { ChessRulesOracle } from './game/rules/ChessRulesOracle';
import { GameSessionManager } from './game/GameSessionManager';
import { MatchmakingService } from './services/MatchmakingService';
import { RatingService } from './services/RatingService';
import { ConnectionRegistry } from './websocket/ConnectionRegistry';
import { ProtocolRouter } from './websocket/ProtocolRouter';
import { WebSocketServer } from './websocket/server';

const SHUTDOWN_TIMEOUT_MS = 30000;

async function createUserRepository(): Promise<UserRepository> {
  if (!config.database.url) {
    logger.warn('DATABASE_URL not set; ratings are kept in memory and lost on restart');
    return new InMemoryUserRepository();
  }
  const pool = await connectDatabase({ url: config.database.url, poolMax: config.database.poolMax });
  return new PostgresUserRepository(pool);
}

async function startServer(): Promise<void> {
  const users = await createUserRepository();
  const ratings = new RatingService(users, config.rating.kFactor);

  const sessions = new GameSessionManager({
    oracle: new ChessRulesOracle(),
    initialClockSeconds: config.game.initialClockSeconds,
    completedSessionTtlMs: config.game.completedSessionTtlMs,
    onCompleted: (completion) => ratings.onGameCompleted(completion),
  });
  const registry = new ConnectionRegistry(config.game.outboxMaxQueued);
  const matchmaking = new MatchmakingService(sessions, registry);
  const router = new ProtocolRouter({ registry, matchmaking, sessions });

  const app = createApp({
    corsOrigin: config.server.corsOrigin,
    health: {
      checkDatabase: config.database.url ? checkDatabaseHealth : null,
      activeGames: () => sessions.getActiveSessionCount(),
      connections: () => registry.size,
    },
  });
  const server = createServer(app);
  const wsServer = new WebSocketServer(server, router, {
    path: config.server.wsPath,
    corsOrigin: config.server.corsOrigin,
    jwtSecret: config.auth.jwtSecret,
  });

  sessions.startSweeper(config.game.sweepIntervalMs);

  server.listen(config.server.port, config.server.host, () => {
    logger.info(`Server running on port ${config.server.port}`, {
      host: config.server.host,
      wsPath: config.server.wsPath,
      environment: config.nodeEnv,
      version: config.app.version,
    });
  });

  let shuttingDown = false;
  const gracefulShutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    // Force close if connections do not drain in time
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();

    sessions.stopSweeper();
    wsServer
      .close()
      .then(() => disconnectDatabase())
      .then(() => {
        logger.info('Server closed');
        process.exit(0);
      })
      .catch((error) => {
        logger.error('Error during shutdown', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  };

  process.on('SIGTERM', gracefulShutdown);
  process.on('SIGINT', gracefulShutdown);
}

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
  process.exit(1);
});

startServer().catch((error) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
