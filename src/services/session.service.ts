import mongoose from 'mongoose';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { ConversationSession, IConversationSession } from '../models/ConversationSession';
import { IDENTIFIER_KINDS, IdentifierSet, Intent, emptyIdentifiers } from '../types';
import { SessionStore } from '../types/capabilities';
import { ConversationTurn, PriorTurnContext, SessionSlots } from '../types/graph';
import { CacheManager } from '../utils/cache-manager';
import { maskConversationId } from '../utils/security';

function copyIdentifiers(ids: IdentifierSet): IdentifierSet {
  return {
    container: [...ids.container],
    purchaseOrder: [...ids.purchaseOrder],
    billOfLading: [...ids.billOfLading],
    booking: [...ids.booking],
  };
}

function copySlots(slots: SessionSlots): SessionSlots {
  return {
    conversationId: slots.conversationId,
    turns: slots.turns.map(turn => ({ ...turn, identifiers: copyIdentifiers(turn.identifiers) })),
    sticky: { identifiers: copyIdentifiers(slots.sticky.identifiers), lastIntent: slots.sticky.lastIntent },
    updatedAt: slots.updatedAt,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseIntent(value: unknown): Intent | null {
  return value === 'retrieval' || value === 'analytics' || value === 'unsupported' ? value : null;
}

function parseIdentifiers(value: unknown): IdentifierSet {
  const ids = emptyIdentifiers();
  if (!isRecord(value)) return ids;
  for (const kind of IDENTIFIER_KINDS) {
    const list = value[kind];
    if (Array.isArray(list)) {
      ids[kind] = list.filter((item): item is string => typeof item === 'string');
    }
  }
  return ids;
}

function parseTurn(value: unknown): ConversationTurn | null {
  if (!isRecord(value) || typeof value.question !== 'string') return null;
  return {
    question: value.question,
    normalizedQuestion: typeof value.normalizedQuestion === 'string' ? value.normalizedQuestion : value.question,
    intent: parseIntent(value.intent),
    identifiers: parseIdentifiers(value.identifiers),
    at: typeof value.at === 'string' ? value.at : '',
  };
}

/** Stored document -> slots. Fields that do not fit are dropped. */
export function parseSessionSlots(raw: unknown): SessionSlots | null {
  if (!isRecord(raw) || typeof raw.conversationId !== 'string') return null;
  const turns = Array.isArray(raw.turns)
    ? raw.turns.map(parseTurn).filter((turn): turn is ConversationTurn => turn !== null)
    : [];
  const sticky = isRecord(raw.sticky) ? raw.sticky : {};
  return {
    conversationId: raw.conversationId,
    turns,
    sticky: { identifiers: parseIdentifiers(sticky.identifiers), lastIntent: parseIntent(sticky.lastIntent) },
    updatedAt: typeof raw.updatedAt === 'string' ? raw.updatedAt : '',
  };
}

/** Process-local store with TTL expiry. Values are copied on the way in and out. */
export class InMemorySessionStore implements SessionStore {
  private readonly cache: CacheManager<SessionSlots>;

  constructor(ttlMs: number = config.session.ttlMs, clock: () => number = Date.now) {
    this.cache = new CacheManager<SessionSlots>(ttlMs, clock);
  }

  async get(conversationId: string): Promise<SessionSlots | null> {
    const slots = this.cache.get(conversationId);
    return slots ? copySlots(slots) : null;
  }

  async set(conversationId: string, slots: SessionSlots): Promise<void> {
    this.cache.set(conversationId, copySlots(slots));
  }

  get size(): number {
    return this.cache.getStats().validEntries;
  }
}

/** Slots in MongoDB; the collection's TTL index removes expired conversations. */
export class MongoSessionStore implements SessionStore {
  constructor(
    private readonly model: mongoose.Model<IConversationSession> = ConversationSession,
    private readonly ttlMs: number = config.session.ttlMs
  ) {}

  async get(conversationId: string): Promise<SessionSlots | null> {
    const document = await this.model.findOne({ conversationId }).lean().exec();
    return parseSessionSlots(document);
  }

  async set(conversationId: string, slots: SessionSlots): Promise<void> {
    await this.model
      .updateOne(
        { conversationId },
        {
          $set: {
            turns: slots.turns,
            sticky: slots.sticky,
            updatedAt: slots.updatedAt,
            expiresAt: new Date(Date.now() + this.ttlMs),
          },
        },
        { upsert: true }
      )
      .exec();
  }
}

/**
 * Serializes work per key. Callers on different keys never wait on each other;
 * a failed task releases the key for the next one.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

export interface TurnRecord {
  question: string;
  normalizedQuestion: string;
  intent: Intent | null;
  identifiers: IdentifierSet;
  topicShift: boolean;
  at: string;
}

/**
 * Short-term conversation slots on top of a session store. Reads and writes
 * for one conversation go through `withConversation`, which holds that
 * conversation's lock for the whole read-modify-write.
 */
export class SessionMemory {
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly store: SessionStore,
    private readonly maxTurns: number = config.session.maxTurns
  ) {}

  withConversation<T>(conversationId: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(conversationId, task);
  }

  load(conversationId: string): Promise<SessionSlots | null> {
    return this.store.get(conversationId);
  }

  /** The previous turn as the extractor sees it, or null on a fresh conversation. */
  priorContext(slots: SessionSlots | null): PriorTurnContext | null {
    const last = slots?.turns[slots.turns.length - 1];
    if (!slots || !last) return null;
    const sticky = slots.sticky.identifiers;
    const hasSticky = IDENTIFIER_KINDS.some(kind => sticky[kind].length > 0);
    return {
      question: last.normalizedQuestion,
      intent: slots.sticky.lastIntent ?? last.intent,
      identifiers: copyIdentifiers(hasSticky ? sticky : last.identifiers),
    };
  }

  /**
   * Next slots after a completed turn. A topic shift starts over from the
   * current turn; otherwise the turn is appended, older turns trimmed, and the
   * sticky identifiers replaced only when this turn named any.
   */
  nextSlots(conversationId: string, previous: SessionSlots | null, turn: TurnRecord): SessionSlots {
    const entry: ConversationTurn = {
      question: turn.question,
      normalizedQuestion: turn.normalizedQuestion,
      intent: turn.intent,
      identifiers: copyIdentifiers(turn.identifiers),
      at: turn.at,
    };
    const named = IDENTIFIER_KINDS.some(kind => turn.identifiers[kind].length > 0);

    if (!previous || turn.topicShift) {
      return {
        conversationId,
        turns: [entry],
        sticky: { identifiers: copyIdentifiers(turn.identifiers), lastIntent: turn.intent },
        updatedAt: turn.at,
      };
    }

    return {
      conversationId,
      turns: [...previous.turns, entry].slice(-this.maxTurns),
      sticky: {
        identifiers: named ? copyIdentifiers(turn.identifiers) : copyIdentifiers(previous.sticky.identifiers),
        lastIntent: turn.intent,
      },
      updatedAt: turn.at,
    };
  }

  async save(conversationId: string, slots: SessionSlots): Promise<void> {
    await this.store.set(conversationId, slots);
    logger.debug('Session slots saved', {
      conversationId: maskConversationId(conversationId),
      turns: slots.turns.length,
    });
  }
}
