// packages/core/src/scheme/parser.ts
import { MAX_SCHEME_LEN } from '../config/defaults.js';
import { InvalidSchemeError, SchemeTooLongError } from '../errors/index.js';
import { eqExact, eqIgnoreAsciiCase, startsWithIgnoreAsciiCase } from '../util/bytes.js';
import { COLON, INVALID, classify } from './chars.js';
import { KNOWN_PROTOCOLS, type Protocol, type ProtocolDescriptor } from './protocols.js';

/**
 * Where a scheme ends inside a full URI.
 *   none     - relative reference, no scheme present (not an error)
 *   standard - a known protocol followed by `://`
 *   other    - `length` scheme bytes followed by `://`
 */
export type SchemeBoundary =
  | { readonly kind: 'none' }
  | { readonly kind: 'standard'; readonly protocol: Protocol }
  | { readonly kind: 'other';    readonly length: number };

/** Outcome of validating a standalone token; the caller keeps the bytes. */
export type ExactMatch =
  | { readonly kind: 'standard'; readonly protocol: Protocol }
  | { readonly kind: 'other' };

const NO_SCHEME: SchemeBoundary = Object.freeze({ kind: 'none' });

/** Case-insensitive lookup used to canonicalize generic tokens. */
export function matchKnown(
  s: Uint8Array,
  protocols: readonly ProtocolDescriptor[] = KNOWN_PROTOCOLS,
): Protocol | undefined {
  return protocols.find(p => eqIgnoreAsciiCase(s, p.literal))?.protocol;
}

/** True when every byte of `s` is a scheme character and the length is in range. */
export function isSchemeText(s: Uint8Array): boolean {
  if (s.length === 0 || s.length > MAX_SCHEME_LEN) return false;
  for (let i = 0; i < s.length; i++) {
    const c = classify(s[i]);
    if (c === COLON || c === INVALID) return false;
  }
  return true;
}

/**
 * Validate `s` as exactly one scheme token.
 *
 * @throws {SchemeTooLongError} more than MAX_SCHEME_LEN bytes
 * @throws {InvalidSchemeError} empty, or a byte outside the scheme alphabet
 */
export function parseExact(
  s: Uint8Array,
  protocols: readonly ProtocolDescriptor[] = KNOWN_PROTOCOLS,
): ExactMatch {
  // fast path: canonical lowercase spelling, byte for byte
  for (const p of protocols) {
    if (eqExact(s, p.literal)) return { kind: 'standard', protocol: p.protocol };
  }

  if (s.length > MAX_SCHEME_LEN) throw new SchemeTooLongError();
  if (s.length === 0) throw new InvalidSchemeError();

  for (let i = 0; i < s.length; i++) {
    const c = classify(s[i]);
    // a ':' here means the caller handed us "scheme://..."
    if (c === COLON || c === INVALID) throw new InvalidSchemeError();
  }

  const known = matchKnown(s, protocols);
  return known === undefined ? { kind: 'other' } : { kind: 'standard', protocol: known };
}

/**
 * Locate a `<scheme>://` prefix at the start of a full URI.
 *
 * The scan gives up at the first `:` that is not followed by `//`; it does
 * not look for a later colon.
 *
 * @throws {SchemeTooLongError} the prefix before `://` exceeds MAX_SCHEME_LEN
 */
export function scanPrefix(
  s: Uint8Array,
  protocols: readonly ProtocolDescriptor[] = KNOWN_PROTOCOLS,
): SchemeBoundary {
  for (const p of protocols) {
    if (startsWithIgnoreAsciiCase(s, p.prefix)) {
      return { kind: 'standard', protocol: p.protocol };
    }
  }

  if (s.length <= 3) return NO_SCHEME;

  for (let i = 0; i < s.length; i++) {
    const c = classify(s[i]);
    if (c === INVALID) return NO_SCHEME;
    if (c !== COLON) continue;

    // need "//" right after the colon
    if (s.length < i + 3) return NO_SCHEME;
    if (s[i + 1] !== 0x2f || s[i + 2] !== 0x2f) return NO_SCHEME;

    if (i > MAX_SCHEME_LEN) throw new SchemeTooLongError();
    return { kind: 'other', length: i };
  }

  return NO_SCHEME;
}
