import { NextFunction, Request, Response, Router } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ConversationManager } from '../services/ConversationManager';

const chatRequestSchema = z.object({
  message: z.string().trim().min(1, 'message is required'),
  session_id: z.string().trim().min(1).optional(),
});

export interface ChatRouterOptions {
  conversationManager: ConversationManager;
  welcomeMessage: string;
  /** Called after a session is cleared so live sockets can be greeted again. */
  onClear?: (sessionId: string) => void;
}

export const createChatRouter = ({
  conversationManager,
  welcomeMessage,
  onClear,
}: ChatRouterOptions): Router => {
  const router = Router();

  router.post('/chat', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = chatRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: parsed.error.errors.map((issue) => issue.message).join(', ') });
        return;
      }

      const sessionId = parsed.data.session_id ?? uuidv4();
      const response = await conversationManager.processQuery(sessionId, parsed.data.message);
      res.json({ response, session_id: sessionId });
    } catch (error) {
      next(error);
    }
  });

  router.post('/chat/:sessionId/clear', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = req.params;
      await conversationManager.clearConversation(sessionId);
      onClear?.(sessionId);
      res.json({
        status: 'success',
        message: 'Chat history cleared',
        welcome_message: welcomeMessage,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
