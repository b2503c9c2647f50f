// packages/core/src/scheme/chars.ts

/** Table entry for `:` */
export const COLON = 0x3a;
/** Table entry for bytes that may not appear in a scheme */
export const INVALID = 0;

/*
 * scheme = ALPHA *( ALPHA / DIGIT / "+" / "-" / "." )
 *
 * Every byte maps to itself when it is a scheme character, to COLON for ':'
 * and to INVALID otherwise. Built once at load, never written afterwards.
 */
export const SCHEME_CHARS: Uint8Array = (() => {
  const table = new Uint8Array(256);
  const mark = (from: number, to: number) => {
    for (let b = from; b <= to; b++) table[b] = b;
  };
  mark(0x41, 0x5a);           // A-Z
  mark(0x61, 0x7a);           // a-z
  mark(0x30, 0x39);           // 0-9
  for (const b of [0x2b, 0x2d, 0x2e]) table[b] = b;  // + - .
  table[COLON] = COLON;
  return table;
})();

export function classify(b: number): number {
  return SCHEME_CHARS[b & 0xff];
}
