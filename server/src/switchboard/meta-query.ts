/**
 * Meta-query detection: greetings, capability questions and very short or
 * ambiguous queries go straight to the universal agent on a cache miss.
 */

export const META_QUERY_PATTERNS: readonly string[] = [
  "what tools", "what can you", "help me", "hello", "hi ", "hey ",
  "who are you", "what are you", "introduce yourself",
  "?", "test",
];

const SHORT_QUERY_LENGTH = 10;

export function isMetaQuery(query: string): boolean {
  const normalized = query.toLowerCase().trim();
  if (normalized.length < SHORT_QUERY_LENGTH) return true;
  return META_QUERY_PATTERNS.some(pattern => normalized.includes(pattern));
}
