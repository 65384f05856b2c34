/**
 * Log hygiene and boundary input checks.
 * Consignee codes and conversation ids are never written to logs in full.
 */

const SENSITIVE_PATTERNS = {
  apiKey: /(?:api[_-]?key|apikey|access[_-]?token|secret[_-]?key)\s*[:=]\s*['"]?([a-zA-Z0-9_\-]{12,})['"]?/gi,
  mongoUri: /mongodb(?:\+srv)?:\/\/[^\s"'<>]+/gi,
  jwt: /eyJ[A-Za-z0-9-_=]+\.eyJ[A-Za-z0-9-_=]+\.?[A-Za-z0-9-_.+/=]*/g,
};

/**
 * Mask credentials embedded in free text (backend error messages, URIs).
 */
export function maskSensitiveData(text: string, maskChar: string = '*'): string {
  if (!text) {
    return text;
  }

  let sanitized = text.replace(SENSITIVE_PATTERNS.apiKey, (match: string, key: string) =>
    match.replace(key, maskChar.repeat(key.length))
  );

  // keep protocol visible
  sanitized = sanitized.replace(SENSITIVE_PATTERNS.mongoUri, match => {
    const [protocol] = match.split('://');
    return `${protocol}://${maskChar.repeat(20)}`;
  });

  sanitized = sanitized.replace(SENSITIVE_PATTERNS.jwt, () => `JWT_${maskChar.repeat(20)}`);

  return sanitized;
}

/**
 * Keep the last three characters of each id: "0025833" -> "****833".
 */
export function maskIdentifiers(ids: readonly string[]): string[] {
  return ids.map(id => (id.length <= 3 ? '***' : `${'*'.repeat(id.length - 3)}${id.slice(-3)}`));
}

const CONTROL_CHARS = /[\x00-\x1F\x7F]/g;
const MAX_QUESTION_LENGTH = 2000;

/**
 * Strip control characters and cap length. Returns '' for non-string input.
 */
export function sanitizeQuestion(input: unknown): string {
  if (typeof input !== 'string') {
    return '';
  }
  return input.replace(CONTROL_CHARS, ' ').trim().substring(0, MAX_QUESTION_LENGTH);
}

/**
 * Split comma-packed consignee codes, trim, drop empties, dedupe keeping order.
 * Accepts "A, B" or ["A", "B, C"].
 */
export function normalizeConsigneeCodes(raw: unknown): string[] {
  const parts: string[] = [];
  const push = (value: string) => {
    for (const piece of value.split(',')) {
      const code = piece.trim();
      if (code) parts.push(code);
    }
  };

  if (typeof raw === 'string') {
    push(raw);
  } else if (Array.isArray(raw)) {
    for (const item of raw) {
      if (typeof item === 'string' || typeof item === 'number') push(String(item));
    }
  }

  return Array.from(new Set(parts));
}

const CONVERSATION_ID_PATTERN = /^[a-zA-Z0-9_\-]{1,128}$/;

export function isValidConversationId(conversationId: string): boolean {
  return CONVERSATION_ID_PATTERN.test(conversationId);
}

export function maskConversationId(conversationId: string): string {
  return conversationId.length <= 8 ? '********' : `${conversationId.slice(0, 4)}…${conversationId.slice(-4)}`;
}

/**
 * Log-safe copy of a context object: conversation ids and consignee lists
 * masked, strings scrubbed of credentials.
 */
export function secureLog(data: Record<string, unknown>): Record<string, unknown> {
  const safe: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (key === 'conversationId' && typeof value === 'string') {
      safe[key] = maskConversationId(value);
    } else if (/consignee/i.test(key) && Array.isArray(value)) {
      safe[key] = maskIdentifiers(value.map(String));
    } else if (typeof value === 'string') {
      safe[key] = maskSensitiveData(value);
    } else {
      safe[key] = value;
    }
  }
  return safe;
}
