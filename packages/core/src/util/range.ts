export function assertSliceBounds(
  total: number,
  offset: number,
  len: number,
): void {
  if (
    !Number.isSafeInteger(offset) || !Number.isSafeInteger(len) ||
    offset < 0 || len < 0 || offset + len > total
  ) {
    throw new RangeError(`read(${offset}, ${len}) exceeds data bounds (length ${total})`);
  }
}
