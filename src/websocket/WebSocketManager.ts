import http from 'http';
import { Server as SocketIOServer, type Socket } from 'socket.io';
import { v4 as uuidv4 } from 'uuid';
import { ConversationManager } from '../services/ConversationManager';
import { logger } from '../utils/logger';

export type OutboundEvent =
  | { type: 'assistant'; content: string }
  | { type: 'status'; content: 'typing' }
  | { type: 'error'; content: string };

const sessionIdFrom = (socket: Socket): string => {
  const requested = socket.handshake.query.sessionId;
  return typeof requested === 'string' && requested.trim() ? requested.trim() : uuidv4();
};

export class WebSocketManager {
  private io: SocketIOServer;
  private connections: Map<string, Set<Socket>>;

  constructor(
    server: http.Server,
    private readonly conversationManager: ConversationManager,
    private readonly welcomeMessage: string
  ) {
    this.io = new SocketIOServer(server, {
      cors: {
        origin: '*',
        methods: ['GET', 'POST'],
      },
    });
    this.connections = new Map();
    this.initialize();
  }

  /** Pushes an event to every socket currently attached to the session. */
  notifySession(sessionId: string, event: OutboundEvent): void {
    for (const socket of this.connections.get(sessionId) ?? []) {
      socket.emit(event.type, event);
    }
  }

  async close(): Promise<void> {
    await this.io.close();
  }

  private initialize() {
    this.io.on('connection', (socket) => {
      const sessionId = sessionIdFrom(socket);
      this.attach(sessionId, socket);
      logger.info({ sessionId, socketId: socket.id }, 'New socket connection established');

      socket.on('message', async (data: unknown) => {
        if (typeof data !== 'string' || !data.trim()) {
          socket.emit('error', { type: 'error', content: 'Message must be a non-empty string' });
          return;
        }
        logger.info({ sessionId, userInput: data }, 'Received message');

        socket.emit('status', { type: 'status', content: 'typing' });
        const response = await this.conversationManager.processQuery(sessionId, data);
        socket.emit('assistant', { type: 'assistant', content: response });
        logger.info({ sessionId }, 'Sent response');
      });

      socket.on('clear', async () => {
        await this.conversationManager.clearConversation(sessionId);
        this.notifySession(sessionId, { type: 'assistant', content: this.welcomeMessage });
      });

      socket.on('disconnect', () => {
        logger.info({ sessionId, socketId: socket.id }, 'Socket disconnected');
        this.detach(sessionId, socket);
      });

      socket.emit('connected', { type: 'connected', sessionId });
      socket.emit('assistant', { type: 'assistant', content: this.welcomeMessage });
    });
  }

  private attach(sessionId: string, socket: Socket): void {
    const sockets = this.connections.get(sessionId) ?? new Set<Socket>();
    sockets.add(socket);
    this.connections.set(sessionId, sockets);
  }

  private detach(sessionId: string, socket: Socket): void {
    const sockets = this.connections.get(sessionId);
    if (!sockets) {
      return;
    }
    sockets.delete(socket);
    if (sockets.size === 0) {
      this.connections.delete(sessionId);
    }
  }
}
