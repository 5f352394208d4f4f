import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import config from './config/index';
import { connectDB, disconnectDB } from './config/database';
import { enabledResponderKinds } from './config/responders';
import { TogetherAIProvider } from './providers/together';
import { CatalogStore } from './repositories/CatalogStore';
import { MongoCatalogStore } from './repositories/MongoCatalogStore';
import { createChatRouter } from './routes/chat';
import { ConversationManager } from './services/ConversationManager';
import { RouterService } from './services/RouterService';
import { Responder, createResponderProfile } from './services/responders';
import { AIProvider } from './types/ai-provider';
import { WebSocketManager } from './websocket/WebSocketManager';
import { describeError } from './utils/errors';
import { logger } from './utils/logger';

export interface AppDependencies {
  store: CatalogStore;
  ai: AIProvider;
}

export const createConversationManager = ({ store, ai }: AppDependencies): ConversationManager => {
  const router = new RouterService(ai, {
    enabled: enabledResponderKinds(config.enabledResponders),
    temperature: config.temperatures.routing,
  });

  return new ConversationManager({
    router,
    createResponder: (kind) =>
      new Responder(createResponderProfile(kind, store), ai, {
        temperature: config.temperatures.generation,
      }),
    responderWindow: config.history.responderWindow,
    routingWindow: config.history.routingWindow,
    maxSessions: config.maxSessions,
  });
};

export const createServer = (dependencies: AppDependencies) => {
  const app = express();
  const server = http.createServer(app);
  const conversationManager = createConversationManager(dependencies);
  const sockets = new WebSocketManager(server, conversationManager, config.welcomeMessage);

  app.use(express.json());
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });
  app.use(
    createChatRouter({
      conversationManager,
      welcomeMessage: config.welcomeMessage,
      onClear: (sessionId) =>
        sockets.notifySession(sessionId, { type: 'assistant', content: config.welcomeMessage }),
    })
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(describeError(error), 'Unhandled request error');
    const status = error instanceof SyntaxError ? 400 : 500;
    res.status(status).json({ error: status === 400 ? 'Invalid JSON body' : 'Internal server error' });
  });

  return { app, server, sockets, conversationManager };
};

const start = async (): Promise<void> => {
  await connectDB();

  const { server, sockets } = createServer({
    store: new MongoCatalogStore(),
    ai: new TogetherAIProvider({
      apiKey: config.together.apiKey ?? '',
      model: config.together.model,
    }),
  });

  server.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    await sockets.close();
    await disconnectDB();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error(describeError(error), 'Error during shutdown');
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
};

if (require.main === module) {
  start().catch((error: unknown) => {
    logger.error(describeError(error), 'Failed to start server');
    process.exit(1);
  });
}
