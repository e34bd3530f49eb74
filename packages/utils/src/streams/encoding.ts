const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** UTF-8 encode. */
export function encodeString(text: string): Uint8Array {
  return encoder.encode(text);
}

/** UTF-8 decode. Invalid sequences become U+FFFD. */
export function decodeString(data: Uint8Array): string {
  return decoder.decode(data);
}
