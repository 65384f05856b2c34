import { IdentifierSet, Intent } from '.';

export interface ConversationTurn {
  question: string;
  normalizedQuestion: string;
  intent: Intent | null;
  identifiers: IdentifierSet;
  at: string;
}

export interface StickySlots {
  identifiers: IdentifierSet;
  lastIntent: Intent | null;
}

export interface SessionSlots {
  conversationId: string;
  turns: ConversationTurn[];
  sticky: StickySlots;
  updatedAt: string;
}

/** What the extractor needs to know about the previous turn. */
export interface PriorTurnContext {
  question: string;
  intent: Intent | null;
  identifiers: IdentifierSet;
}
