// packages/core/src/scheme/Scheme.ts
import { InvalidSchemeError, InvalidUriError, SchemeTooLongError } from '../errors/index.js';
import { MAX_SCHEME_LEN } from '../config/defaults.js';
import { debugAssert } from '../util/assert.js';
import { asciiLower, asciiText, eqIgnoreAsciiCase, toBytes } from '../util/bytes.js';
import { Fnv1a } from '../util/hash.js';
import { INSPECT } from '../util/inspect.js';
import { assertSliceBounds } from '../util/range.js';
import { isSchemeText, matchKnown, parseExact, type SchemeBoundary } from './parser.js';
import { Protocol, describeProtocol } from './protocols.js';

type SchemeRepr =
  | { readonly kind: 'standard'; readonly protocol: Protocol }
  | { readonly kind: 'other';    readonly bytes: Uint8Array };

/**
 * The scheme component of a URI.
 *
 * Known protocols are shared constants; any other token holds its validated
 * bytes, either as a private copy or as a read-only view into the buffer it
 * was scanned from. Equality and hashing ignore ASCII case.
 *
 * ```ts
 * const s = Scheme.parse('HTTP');
 * s === Scheme.HTTP;          // true, spellings of known protocols are canonical
 * Scheme.parse('Git+SSH').asStr();   // 'Git+SSH'
 * ```
 */
export class Scheme {
  /** HTTP protocol scheme */
  static readonly HTTP  = new Scheme({ kind: 'standard', protocol: Protocol.Http });
  /** HTTP protocol over TLS */
  static readonly HTTPS = new Scheme({ kind: 'standard', protocol: Protocol.Https });
  /** RTSP protocol scheme */
  static readonly RTSP  = new Scheme({ kind: 'standard', protocol: Protocol.Rtsp });
  /** RTSP protocol over TLS */
  static readonly RTSPS = new Scheme({ kind: 'standard', protocol: Protocol.Rtsps });

  #text: string | undefined;

  private constructor(private readonly inner: SchemeRepr) {}

  /* ------------------------------------------------------------------ */
  /*  Construction                                                       */
  /* ------------------------------------------------------------------ */

  /**
   * Parse a standalone scheme token (no `://`, nothing after it).
   * @throws {InvalidSchemeError | SchemeTooLongError}
   */
  static parse(input: string | Uint8Array): Scheme {
    const bytes = toBytes(input);
    const m     = parseExact(bytes);
    if (m.kind === 'standard') return Scheme.standard(m.protocol);
    // strings were freshly encoded; caller-owned bytes get copied
    return new Scheme({ kind: 'other', bytes: typeof input === 'string' ? bytes : bytes.slice() });
  }

  /** Like `parse`, but `undefined` instead of a parse error. */
  static tryParse(input: string | Uint8Array): Scheme | undefined {
    try {
      return Scheme.parse(input);
    } catch (err) {
      if (err instanceof InvalidUriError) return undefined;
      throw err;
    }
  }

  /**
   * Build the token `boundary` describes, copying the scheme bytes out of
   * `input`. `input` must be the buffer the boundary was scanned from.
   */
  static fromBoundary(input: Uint8Array, boundary: SchemeBoundary): Scheme {
    switch (boundary.kind) {
      case 'standard':
        return Scheme.standard(boundary.protocol);
      case 'other':
        return Scheme.fromShared(input, boundary.length).copy();
      case 'none':
        throw new InvalidSchemeError();
    }
  }

  /**
   * Zero-copy token over `buffer[0, length)`.
   *
   * The slice must come from `scanSchemePrefix(buffer)`; only its bounds
   * and length are checked unless debug assertions are on. The token reads
   * through the view for its whole lifetime, so `buffer` must not be
   * written to afterwards.
   */
  static fromShared(buffer: Uint8Array, length: number): Scheme {
    assertSliceBounds(buffer.length, 0, length);
    if (length === 0) throw new InvalidSchemeError();
    if (length > MAX_SCHEME_LEN) throw new SchemeTooLongError();

    const view = buffer.subarray(0, length);
    debugAssert(() => isSchemeText(view), 'shared scheme slice was not validated');

    const known = matchKnown(view);
    if (known !== undefined) return Scheme.standard(known);
    return new Scheme({ kind: 'other', bytes: view });
  }

  private static standard(p: Protocol): Scheme {
    switch (p) {
      case Protocol.Http : return Scheme.HTTP;
      case Protocol.Https: return Scheme.HTTPS;
      case Protocol.Rtsp : return Scheme.RTSP;
      case Protocol.Rtsps: return Scheme.RTSPS;
    }
  }

  /** Detach an `other` token from whatever buffer it views. */
  private copy(): Scheme {
    if (this.inner.kind === 'standard') return this;
    return new Scheme({ kind: 'other', bytes: this.inner.bytes.slice() });
  }

  /* ------------------------------------------------------------------ */
  /*  Views                                                              */
  /* ------------------------------------------------------------------ */

  /** The known protocol member, or `undefined` for any other scheme. */
  get protocol(): Protocol | undefined {
    return this.inner.kind === 'standard' ? this.inner.protocol : undefined;
  }

  isKnown(): boolean {
    return this.inner.kind === 'standard';
  }

  /**
   * Canonical text: the lowercase spelling for known protocols, the original
   * bytes (case preserved) otherwise.
   */
  asStr(): string {
    if (this.inner.kind === 'standard') return describeProtocol(this.inner.protocol).name;
    this.#text ??= asciiText(this.inner.bytes);
    return this.#text;
  }

  get length(): number {
    return this.inner.kind === 'standard'
      ? describeProtocol(this.inner.protocol).literal.length
      : this.inner.bytes.length;
  }

  /* ------------------------------------------------------------------ */
  /*  Equality & hashing (ASCII case-insensitive)                        */
  /* ------------------------------------------------------------------ */

  equals(other: Scheme | string): boolean {
    if (typeof other === 'string') {
      return eqIgnoreAsciiCase(toBytes(this.asStr()), toBytes(other));
    }
    const a = this.inner;
    const b = other.inner;
    if (a.kind === 'standard' && b.kind === 'standard') return a.protocol === b.protocol;
    if (a.kind === 'other'    && b.kind === 'other')    return eqIgnoreAsciiCase(a.bytes, b.bytes);
    return false;
  }

  /** 32-bit hash; equal tokens (per `equals`) always hash alike. */
  hashCode(): number {
    const h = new Fnv1a();
    if (this.inner.kind === 'standard') return h.writeU8(this.inner.protocol).finish();

    const bytes = this.inner.bytes;
    h.writeU32(bytes.length);
    for (let i = 0; i < bytes.length; i++) h.writeU8(asciiLower(bytes[i]));
    return h.finish();
  }

  /* ------------------------------------------------------------------ */
  /*  Display                                                            */
  /* ------------------------------------------------------------------ */

  toString(): string { return this.asStr(); }

  toJSON(): string { return this.asStr(); }

  [INSPECT](): string { return JSON.stringify(this.asStr()); }
}
