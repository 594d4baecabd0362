import { ConfigError } from '@embedcache/shared';

const NAMESPACE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Longest identifier Postgres keeps without truncation. */
export const MAX_NAMESPACE_LENGTH = 63;

/**
 * Namespaces become table names, so only plain identifiers are accepted.
 */
export function assertValidNamespace(name: string): void {
  if (!NAMESPACE_PATTERN.test(name) || name.length > MAX_NAMESPACE_LENGTH) {
    throw new ConfigError(`Invalid namespace name "${name}"`, {
      details: {
        pattern: NAMESPACE_PATTERN.source,
        maxLength: MAX_NAMESPACE_LENGTH,
      },
    });
  }
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** Splits `items` into consecutive slices of at most `size` elements. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}
