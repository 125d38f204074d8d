import { Server as SocketServer, type Socket } from 'socket.io';
import type { Server as HttpServer } from 'node:http';
import { verifyJWT } from '../auth/jwt.js';
import { config } from '../config.js';

/**
 * Set up Socket.IO with the /events namespace (issue, action and approval
 * events for dashboards). Requires JWT authentication via handshake.auth.token.
 */
export function setupSocketIO(server: HttpServer) {
  const io = new SocketServer(server, {
    cors: {
      origin: config.corsOrigins,
      methods: ['GET', 'POST'],
    },
    pingInterval: 25000,
    pingTimeout: 10000,
  });

  const eventsNs = io.of('/events');

  eventsNs.use((socket: Socket, next: (err?: Error) => void) => {
    const token: unknown = socket.handshake.auth.token;
    if (!token || typeof token !== 'string') {
      next(new Error('Authentication required'));
      return;
    }

    if (!verifyJWT(token)) {
      next(new Error('Invalid or expired token'));
      return;
    }

    next();
  });

  eventsNs.on('connection', (socket) => {
    console.log(`[Socket.IO] /events client connected: ${socket.id}`);
    socket.on('disconnect', (reason) => {
      console.log(`[Socket.IO] /events client disconnected: ${socket.id} (${reason})`);
    });
  });

  console.log('[Socket.IO] WebSocket server initialized with /events namespace');

  return { io, eventsNs };
}
