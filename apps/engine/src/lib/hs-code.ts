export function normalizeHsCode(code: string): string {
  return code.replace(/\D+/g, '');
}

/**
 * Digit length of `prefix` when it is a prefix of `hsCode`, -1 otherwise.
 * Both sides are compared as digit strings, so `7208.10` and `720810` are equal.
 */
export function hsPrefixMatchLength(hsCode: string, prefix: string): number {
  const hs = normalizeHsCode(hsCode);
  const p = normalizeHsCode(prefix);
  if (!p) return -1;
  return hs.startsWith(p) ? p.length : -1;
}

export function longestHsPrefixMatch(hsCode: string, prefixes: readonly string[]): number {
  let best = -1;
  for (const prefix of prefixes) {
    best = Math.max(best, hsPrefixMatchLength(hsCode, prefix));
  }
  return best;
}
