import { Server as SocketIOServer } from 'socket.io';
import type { Server as HTTPServer } from 'http';
import type {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  SocketData,
} from '../../shared/types/websocket';
import { createSocketAuthMiddleware, type RelaySocket } from '../middleware/auth';
import { logger } from '../utils/logger';
import type { ProtocolRouter } from './ProtocolRouter';
import type { MessageTransport } from './Outbox';

export interface WebSocketServerOptions {
  path: string;
  corsOrigin: string;
  jwtSecret: string;
}

/**
 * Socket.IO transport for the relay protocol. Every frame travels as the
 * single argument of the `message` event; the router does the rest.
 */
export class WebSocketServer {
  private io: SocketIOServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

  constructor(
    httpServer: HTTPServer,
    private readonly router: ProtocolRouter,
    options: WebSocketServerOptions
  ) {
    this.io = new SocketIOServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(
      httpServer,
      {
        path: options.path,
        cors: {
          origin: options.corsOrigin,
          methods: ['GET', 'POST'],
        },
        transports: ['websocket', 'polling'],
      }
    );

    // Unauthenticated handshakes never reach the connection handler.
    this.io.use(createSocketAuthMiddleware(options.jwtSecret));
    this.io.on('connection', (socket) => this.handleConnection(socket));
  }

  private handleConnection(socket: RelaySocket): void {
    const principal = socket.data.principal;
    const handle = this.router.handleConnection(principal, this.createTransport(socket));

    logger.info('WebSocket connected', {
      userId: principal.id,
      socketId: socket.id,
      connectionId: handle,
    });

    socket.on('message', (frame: unknown) => {
      // handleFrame never rejects
      void this.router.handleFrame(handle, frame);
    });

    socket.on('disconnect', (reason) => {
      this.router.handleDisconnect(handle, reason).catch((error) => {
        logger.error('Disconnect cleanup failed', {
          connectionId: handle,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    });
  }

  private createTransport(socket: RelaySocket): MessageTransport {
    return {
      write: (message) => {
        if (socket.disconnected) {
          throw new Error('Socket is disconnected');
        }
        socket.emit('message', message);
      },
      close: (reason) => {
        logger.warn('Closing WebSocket connection', { socketId: socket.id, reason });
        socket.disconnect(true);
      },
    };
  }

  public close(): Promise<void> {
    return new Promise((resolve) => {
      this.io.close(() => resolve());
    });
  }
}
