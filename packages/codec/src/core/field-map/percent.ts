/**
 * `application/x-www-form-urlencoded` component decoding: `+` is a space,
 * `%XX` sequences are UTF-8 bytes.
 *
 * @throws URIError on a malformed escape
 */
export function percentDecode(raw: string): string {
  return decodeURIComponent(raw.replace(/\+/g, " "))
}

export function percentEncode(raw: string): string {
  return encodeURIComponent(raw).replace(/%20/g, "+")
}
