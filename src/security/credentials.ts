/**
 * @fileoverview Tenant credential validation
 *
 * A credential is the connection URI of the tenant's own document store. It is
 * opaque to the service apart from its scheme; anything that does not start
 * with an accepted scheme is rejected before it can be cached or used.
 */

import { CredentialError } from '../core/errors.js';
import { computeChecksum16 } from '../utils/checksums.js';

/** Header carrying the credential. Header lookups are case-insensitive. */
export const CREDENTIAL_HEADER = 'mongodb-uri';

export const ACCEPTED_CREDENTIAL_SCHEMES = ['mongodb://', 'mongodb+srv://'] as const;

/** Validated credential; only produced by validateCredential. */
export interface TenantCredential {
  /** The credential exactly as supplied (after trimming). */
  readonly value: string;
  /** Short digest identifying the tenant in logs and cache keys shown to operators. */
  readonly tenantId: string;
}

export type CredentialCheck =
  | { ok: true; credential: TenantCredential }
  | { ok: false; error: CredentialError };

export function describeAcceptedSchemes(): string {
  return ACCEPTED_CREDENTIAL_SCHEMES.join(' or ');
}

export function hasAcceptedScheme(value: string): boolean {
  return ACCEPTED_CREDENTIAL_SCHEMES.some((scheme) => value.startsWith(scheme));
}

export function tenantIdFor(value: string): string {
  return computeChecksum16(value);
}

/**
 * Validate and normalize a raw credential string.
 *
 * Surrounding whitespace is dropped; the remainder must be non-empty and start
 * with one of the accepted schemes.
 */
export function checkCredential(raw: string | null | undefined): CredentialCheck {
  const value = raw?.trim() ?? '';
  if (value.length === 0) {
    return {
      ok: false,
      error: new CredentialError(
        'missing',
        `Missing header '${CREDENTIAL_HEADER}' (expected ${describeAcceptedSchemes()})`
      ),
    };
  }
  if (!hasAcceptedScheme(value)) {
    return {
      ok: false,
      error: new CredentialError(
        'invalid_scheme',
        `Invalid header '${CREDENTIAL_HEADER}' (expected ${describeAcceptedSchemes()})`
      ),
    };
  }
  return { ok: true, credential: { value, tenantId: tenantIdFor(value) } };
}

/**
 * Throwing variant of checkCredential.
 *
 * @throws CredentialError
 */
export function validateCredential(raw: string | null | undefined): TenantCredential {
  const check = checkCredential(raw);
  if (!check.ok) {
    throw check.error;
  }
  return check.credential;
}

/**
 * Render a credential safe for logs: user info, query string and fragment are
 * removed, scheme and hosts are kept.
 */
export function redactCredential(value: string): string {
  const schemeEnd = value.indexOf('://');
  if (schemeEnd < 0) {
    return '<redacted>';
  }
  const scheme = value.slice(0, schemeEnd + 3);
  let rest = value.slice(schemeEnd + 3);
  const at = rest.lastIndexOf('@', firstIndexOfAny(rest, ['/', '?', '#']));
  if (at >= 0) {
    rest = rest.slice(at + 1);
  }
  const cut = firstIndexOfAny(rest, ['?', '#']);
  return scheme + rest.slice(0, cut);
}

function firstIndexOfAny(value: string, needles: readonly string[]): number {
  let result = value.length;
  for (const needle of needles) {
    const index = value.indexOf(needle);
    if (index >= 0 && index < result) {
      result = index;
    }
  }
  return result;
}
