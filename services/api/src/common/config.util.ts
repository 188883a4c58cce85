/**
 * Reads a boolean flag from configuration. Environment values arrive as
 * strings, so `'true'`, `'1'`, `'yes'` and `'on'` count as set.
 */
export function parseFlag(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    return value !== 0;
  }

  if (typeof value !== 'string' || value.trim() === '') {
    return fallback;
  }

  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Splits a comma separated configuration list, dropping blanks.
 */
export function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }

  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

  return items.length > 0 ? items : fallback;
}
