import { ConversationTurn, ResponderKind } from '../types/conversation';
import { describeError } from '../utils/errors';
import { createComponentLogger } from '../utils/logger';
import { RouterService } from './RouterService';
import { APOLOGY_MESSAGE, Responder } from './responders';

const logger = createComponentLogger('conversation');

export interface ConversationManagerOptions {
  router: Pick<RouterService, 'route'>;
  createResponder: (kind: ResponderKind) => Pick<Responder, 'respond'>;
  /** Turns handed to the responder. */
  responderWindow: number;
  /** Turns, out of the responder window, handed to the router. */
  routingWindow: number;
  /** Sessions kept in memory before the least recently used one is dropped. */
  maxSessions: number;
}

const lastTurns = <T>(turns: readonly T[], count: number): T[] =>
  count <= 0 ? [] : turns.slice(-count);

export class ConversationManager {
  private readonly sessions = new Map<string, ConversationTurn[]>();
  private readonly responders = new Map<ResponderKind, Pick<Responder, 'respond'>>();
  private readonly pending = new Map<string, Promise<void>>();

  constructor(private readonly options: ConversationManagerOptions) {
    logger.info({
      responderWindow: options.responderWindow,
      routingWindow: options.routingWindow,
      maxSessions: options.maxSessions,
    }, 'ConversationManager initialized');
  }

  /** Always resolves with text; failures become an apology and leave history untouched. */
  async processQuery(sessionId: string, message: string): Promise<string> {
    return this.withSession(sessionId, () => this.handleTurn(sessionId, message));
  }

  async clearConversation(sessionId: string): Promise<void> {
    await this.withSession(sessionId, async () => {
      const history = this.sessions.get(sessionId);
      if (!history) {
        return;
      }
      logger.info({ sessionId }, 'Clearing conversation history');
      history.length = 0;
    });
  }

  getHistory(sessionId: string): readonly ConversationTurn[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  private async handleTurn(sessionId: string, message: string): Promise<string> {
    logger.info({ sessionId, message }, 'Processing query');
    const history = this.touchSession(sessionId);
    const context = lastTurns(history, this.options.responderWindow);

    try {
      const decision = await this.options.router.route(
        message,
        lastTurns(context, this.options.routingWindow)
      );
      const reply = await this.responderFor(decision.responder).respond(message, context);

      history.push({ role: 'user', content: message }, { role: 'assistant', content: reply });
      logger.info({ sessionId, responder: decision.responder }, 'Processed query');
      return reply;
    } catch (error) {
      logger.error({ sessionId, ...describeError(error) }, 'Error processing query');
      return APOLOGY_MESSAGE;
    }
  }

  private responderFor(kind: ResponderKind): Pick<Responder, 'respond'> {
    let responder = this.responders.get(kind);
    if (!responder) {
      logger.debug({ kind }, 'Creating responder');
      responder = this.options.createResponder(kind);
      this.responders.set(kind, responder);
    }
    return responder;
  }

  /** Returns the session's history, creating it and marking it most recently used. */
  private touchSession(sessionId: string): ConversationTurn[] {
    const history = this.sessions.get(sessionId) ?? [];
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, history);
    this.evictIdleSessions();
    return history;
  }

  private evictIdleSessions(): void {
    for (const sessionId of this.sessions.keys()) {
      if (this.sessions.size <= this.options.maxSessions) {
        return;
      }
      if (!this.pending.has(sessionId)) {
        this.sessions.delete(sessionId);
        logger.debug({ sessionId }, 'Evicted idle session');
      }
    }
  }

  /** Runs `task` after every earlier task queued for the same session. */
  private async withSession<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.pending.set(sessionId, settled);

    try {
      return await run;
    } finally {
      if (this.pending.get(sessionId) === settled) {
        this.pending.delete(sessionId);
      }
    }
  }
}
