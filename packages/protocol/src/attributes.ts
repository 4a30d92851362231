// Attribute keys as they are stored on entities

/**
 * Normalise an attribute key: trimmed, lower-cased, spaces and underscores
 * folded to hyphens ("Access Link" → "access-link").
 */
export function normalizeAttributeKey(key: string): string {
  return key.trim().toLowerCase().replace(/[\s_]+/g, '-');
}
