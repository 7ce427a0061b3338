/**
 * Scope parsing and set checks. Scopes are case-sensitive identifiers,
 * space-delimited on the wire.
 */

/**
 * Split a scope string into unique identifiers, keeping first-seen order.
 */
export function parseScope(scope: string | null | undefined): string[] {
  if (!scope) return [];
  return [...new Set(scope.split(' ').filter(Boolean))];
}

export function formatScope(scopes: readonly string[]): string {
  return scopes.join(' ');
}

/**
 * Scopes from `requested` that are not in `permitted`.
 */
export function scopesOutside(requested: readonly string[], permitted: readonly string[]): string[] {
  const allowed = new Set(permitted);
  return requested.filter((s) => !allowed.has(s));
}

export function isScopeSubset(requested: readonly string[], permitted: readonly string[]): boolean {
  return scopesOutside(requested, permitted).length === 0;
}
