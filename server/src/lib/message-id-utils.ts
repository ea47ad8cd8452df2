/**
 * Message ID Utilities
 *
 * Normalizes message IDs to a consistent format (without angle brackets).
 * mailparser keeps the angle brackets on Message-ID and References values.
 */

/**
 * Normalize message ID by stripping surrounding whitespace and angle brackets
 */
export function normalizeMessageId(messageId: string | undefined): string | undefined {
  if (!messageId) return undefined;
  const normalized = messageId.trim().replace(/^<|>$/g, '');
  return normalized || undefined;
}

/**
 * Normalize a References/In-Reply-To value, which mailparser returns as a
 * single string for one id and as an array for several
 */
export function normalizeMessageIdArray(messageId: string | string[] | undefined): string[] {
  if (!messageId) return [];
  const ids = Array.isArray(messageId) ? messageId : messageId.split(/\s+/);
  return ids
    .map(id => normalizeMessageId(id))
    .filter((id): id is string => id !== undefined);
}

/**
 * Wrap a normalized message ID in angle brackets for outgoing headers
 */
export function formatMessageId(messageId: string): string {
  return `<${messageId.replace(/^<|>$/g, '')}>`;
}
