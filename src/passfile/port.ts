export const MIN_PORT = 1;
export const MAX_PORT = 65535;
export const DEFAULT_PORT = 5432;

/**
 * Parse a TCP port number.
 *
 * Accepts decimal digits only (surrounding whitespace is ignored) and
 * returns `null` for anything outside 1..65535.
 */
export function parsePort(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  return isValidPort(Number(trimmed)) ? Number(trimmed) : null;
}

export function isValidPort(port: number): boolean {
  return Number.isSafeInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}
