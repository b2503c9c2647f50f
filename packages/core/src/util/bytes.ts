/**
 * Tiny run-time test - are we really in Node/Bun
 */
export function isNodeLike(): boolean {
  return (
    typeof process !== 'undefined' &&
    typeof process.versions === 'object' &&
    // `browserify` & friends set `process.browser = true`
    Reflect.get(process, 'browser') !== true
  );
}

/* ------------------------------------------------------------------ */

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Strings are taken as UTF-8; byte input is used as-is (no copy). */
export function toBytes(input: string | Uint8Array): Uint8Array {
  return typeof input === 'string' ? encoder.encode(input) : input;
}

/** Decode bytes already known to be ASCII. */
export function asciiText(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

export function asciiLower(b: number): number {
  return b >= 0x41 && b <= 0x5a ? b | 0x20 : b;
}

/**
 * Compare `b` against the first `b.length` bytes of `a` with ASCII case
 * folding. Returns false when `a` is shorter.
 */
export function startsWithIgnoreAsciiCase(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length < b.length) return false;
  for (let i = 0; i < b.length; i++) {
    if (asciiLower(a[i]) !== asciiLower(b[i])) return false;
  }
  return true;
}

export function eqIgnoreAsciiCase(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && startsWithIgnoreAsciiCase(a, b);
}

export function eqExact(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
