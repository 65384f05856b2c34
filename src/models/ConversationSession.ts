import mongoose, { Schema } from 'mongoose';
import { IDENTIFIER_KINDS } from '../types';

const INTENTS = ['retrieval', 'analytics', 'unsupported'];

const IdentifierSetSchema = new Schema(
  Object.fromEntries(IDENTIFIER_KINDS.map(kind => [kind, { type: [String], default: [] }])),
  { _id: false }
);

const TurnSchema = new Schema(
  {
    question: { type: String, required: true },
    normalizedQuestion: { type: String, required: true },
    intent: { type: String, enum: INTENTS, default: null },
    identifiers: { type: IdentifierSetSchema, default: () => ({}) },
    at: { type: String, required: true },
  },
  { _id: false }
);

export interface IConversationSession {
  conversationId: string;
  turns: unknown[];
  sticky: unknown;
  updatedAt: string;
  expiresAt: Date;
}

const ConversationSessionSchema = new Schema<IConversationSession>(
  {
    conversationId: { type: String, required: true, unique: true },
    turns: { type: [TurnSchema], default: [] },
    sticky: {
      type: new Schema(
        {
          identifiers: { type: IdentifierSetSchema, default: () => ({}) },
          lastIntent: { type: String, enum: INTENTS, default: null },
        },
        { _id: false }
      ),
      default: () => ({}),
    },
    updatedAt: { type: String, required: true },
    expiresAt: { type: Date, required: true },
  },
  { collection: 'conversation_sessions' }
);

// Mongo drops the document once expiresAt has passed
ConversationSessionSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export const ConversationSession = mongoose.model<IConversationSession>('ConversationSession', ConversationSessionSchema);
