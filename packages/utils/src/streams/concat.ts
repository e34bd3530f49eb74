/**
 * Join byte pieces into one new array, in order.
 *
 * Always copies, so the result never aliases a caller's buffer.
 */
export function concat(...pieces: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const piece of pieces) total += piece.length;
  const result = new Uint8Array(total);
  let offset = 0;
  for (const piece of pieces) {
    result.set(piece, offset);
    offset += piece.length;
  }
  return result;
}
