/**
 * Case-insensitive substring scan against the configured weak-pattern list.
 * Returns matches in list order.
 */
export function findCommonPatterns(password: string, patterns: readonly string[]): string[] {
  const haystack = password.toLowerCase();
  return patterns.filter((pattern) => haystack.includes(pattern.toLowerCase()));
}
