export function assertSliceBounds(
  total: number,
  offset: number,
  len: number,
): void {
  if (!Number.isInteger(offset) || !Number.isInteger(len)) {
    throw new RangeError('slice offset and length must be integers');
  }
  if (offset < 0 || len < 0 || offset + len > total) {
    throw new RangeError(`slice [${offset}, ${offset + len}) exceeds buffer of ${total} bytes`);
  }
}
