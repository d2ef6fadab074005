// RFC 4648 standard alphabet, padded, no line breaks
const CANONICAL_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64")
}

/**
 * @throws SyntaxError when `text` is not canonical padded base64
 */
export function decodeBase64(text: string): Uint8Array {
  if (!CANONICAL_BASE64.test(text)) {
    throw new SyntaxError("invalid base64 text")
  }

  return new Uint8Array(Buffer.from(text, "base64"))
}
