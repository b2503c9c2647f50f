// packages/core/src/util/hash.ts

/**
 * 32-bit FNV-1a accumulator. Values are fed byte-wise so two hashers fed the
 * same byte sequence always agree, whatever the call pattern.
 */
export class Fnv1a {
  private static readonly OFFSET_BASIS = 0x811c9dc5;
  private static readonly PRIME        = 0x01000193;

  private state = Fnv1a.OFFSET_BASIS;

  writeU8(b: number): this {
    this.state ^= b & 0xff;
    this.state = Math.imul(this.state, Fnv1a.PRIME);
    return this;
  }

  /** Little-endian, four bytes. */
  writeU32(n: number): this {
    for (let i = 0; i < 4; i++) this.writeU8(n >>> (i * 8));
    return this;
  }

  finish(): number {
    return this.state >>> 0;
  }
}
