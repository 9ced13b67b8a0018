// ISO calendar dates (YYYY-MM-DD) order lexicographically; bounds are inclusive.
export function isWithinWindow(date: string, from?: string, to?: string): boolean {
  if (from && date < from) return false;
  if (to && date > to) return false;
  return true;
}
