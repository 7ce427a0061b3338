/**
 * Redirect URI checks.
 *
 * Matching is exact string comparison against the registered list: no
 * trailing-slash, case or query normalisation, so `https://example.org`
 * and `https://example.org/` are different URIs.
 */

export function isRegisteredRedirectUri(uri: string, registered: readonly string[]): boolean {
  return registered.includes(uri);
}

/**
 * Scheme of an absolute URI without the trailing colon, or null if the
 * URI does not parse.
 */
export function redirectUriScheme(uri: string): string | null {
  try {
    return new URL(uri).protocol.replace(/:$/, '');
  } catch {
    return null;
  }
}

export function hasAllowedScheme(uri: string, allowedSchemes: readonly string[]): boolean {
  const scheme = redirectUriScheme(uri);
  return scheme !== null && allowedSchemes.includes(scheme);
}

/**
 * Registration-time check: absolute, allowed scheme, no fragment (RFC 6749 3.1.2).
 */
export function isValidRedirectUri(uri: string, allowedSchemes: readonly string[]): boolean {
  try {
    const parsed = new URL(uri);
    if (parsed.hash || uri.includes('#')) {
      return false;
    }
    return hasAllowedScheme(uri, allowedSchemes);
  } catch {
    return false;
  }
}

/**
 * Append query parameters to a redirect URI without normalising the URI
 * itself (WHATWG URL serialisation would turn `https://example.org` into
 * `https://example.org/`).
 */
export function appendQueryParams(uri: string, params: Record<string, string | null | undefined>): string {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== null && value !== undefined) {
      query.append(key, value);
    }
  }

  const encoded = query.toString();
  if (!encoded) return uri;

  const separator = uri.includes('?') ? (uri.endsWith('?') || uri.endsWith('&') ? '' : '&') : '?';
  return `${uri}${separator}${encoded}`;
}
