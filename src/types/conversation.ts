export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
}

export const RESPONDER_KINDS = ['product_details', 'reviews', 'orders'] as const;

export type ResponderKind = (typeof RESPONDER_KINDS)[number];

export interface RoutingDecision {
  responder: ResponderKind;
  confidence: number;
  rationale: string;
}
