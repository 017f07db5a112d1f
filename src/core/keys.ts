/**
 * Sanitize a literal into the key suffix: lowercase, runs of anything
 * outside [a-z0-9] collapsed to `_`, outer underscores stripped
 */
export function sanitizeKey(text: string): string {
  const sanitized = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return sanitized || 'text';
}

/**
 * Generate a unique key `{namespace}-{sanitized}` and record it in `usedKeys`.
 * Collisions get `_1`, `_2`, ... appended.
 */
export function generateKey(namespace: string, text: string, usedKeys: Set<string>): string {
  const base = `${namespace}-${sanitizeKey(text)}`;
  let candidate = base;
  let counter = 1;

  while (usedKeys.has(candidate)) {
    candidate = `${base}_${counter++}`;
  }

  usedKeys.add(candidate);
  return candidate;
}
