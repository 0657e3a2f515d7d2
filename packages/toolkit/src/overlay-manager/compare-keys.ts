/**
 * Orders logical paths by UTF-16 code unit, independent of locale, so a
 * parent sorts before everything beneath it.
 */
export function compareKeys(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
