import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { Socket } from 'socket.io';
import type { Principal } from '../../shared/types/game';
import type {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  SocketData,
} from '../../shared/types/websocket';
import { logger } from '../utils/logger';

export type AuthErrorCode = 'TOKEN_REQUIRED' | 'TOKEN_EXPIRED' | 'INVALID_TOKEN' | 'TOKEN_VERIFICATION_FAILED';

export class AuthenticationError extends Error {
  constructor(
    message: string,
    public readonly code: AuthErrorCode
  ) {
    super(message);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Claims accepted on a handshake token. Issuers differ on the id claim
 * name, so `userId`, `user_id` and `sub` are all honoured.
 */
const AccessTokenClaimsSchema = z
  .object({
    userId: z.string().min(1).optional(),
    user_id: z.string().min(1).optional(),
    sub: z.string().min(1).optional(),
    username: z.string().min(1),
    displayName: z.string().min(1).optional(),
  })
  .transform((claims, ctx) => {
    const id = claims.userId ?? claims.user_id ?? claims.sub;
    if (!id) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Token carries no user id' });
      return z.NEVER;
    }
    return { id, displayName: claims.displayName ?? claims.username };
  });

/**
 * Verify an HS256 access token and return the principal it names.
 */
export const verifyToken = (token: string, secret: string): Principal => {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: ['HS256'] });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new AuthenticationError('Token has expired', 'TOKEN_EXPIRED');
    } else if (error instanceof jwt.JsonWebTokenError) {
      throw new AuthenticationError('Invalid token', 'INVALID_TOKEN');
    }
    throw new AuthenticationError('Token verification failed', 'TOKEN_VERIFICATION_FAILED');
  }

  const claims = AccessTokenClaimsSchema.safeParse(decoded);
  if (!claims.success) {
    throw new AuthenticationError('Invalid token payload', 'INVALID_TOKEN');
  }
  return claims.data;
};

export type RelaySocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

/**
 * Read the handshake token from `auth.token`, the `token` query parameter
 * or an `Authorization: Bearer` header, in that order.
 */
export const extractHandshakeToken = (socket: RelaySocket): string | undefined => {
  const authToken: unknown = socket.handshake.auth?.token;
  if (typeof authToken === 'string' && authToken.length > 0) {
    return authToken;
  }

  const queryToken = socket.handshake.query.token;
  if (typeof queryToken === 'string' && queryToken.length > 0) {
    return queryToken;
  }

  const header = socket.handshake.headers.authorization;
  if (header?.startsWith('Bearer ')) {
    return header.slice('Bearer '.length);
  }
  return undefined;
};

/**
 * Socket.IO middleware that rejects the handshake unless it carries a valid
 * token, and attaches the resulting principal to `socket.data`.
 */
export const createSocketAuthMiddleware = (secret: string) => {
  return (socket: RelaySocket, next: (err?: Error) => void): void => {
    const token = extractHandshakeToken(socket);
    if (!token) {
      logger.warn('WebSocket handshake without token', { socketId: socket.id });
      next(new Error('Authentication token required'));
      return;
    }

    try {
      socket.data.principal = verifyToken(token, secret);
      logger.info('WebSocket authenticated', {
        userId: socket.data.principal.id,
        socketId: socket.id,
      });
      next();
    } catch (error) {
      logger.warn('WebSocket JWT verification failed', {
        error: error instanceof Error ? error.message : String(error),
        socketId: socket.id,
      });
      next(new Error('Authentication failed'));
    }
  };
};
