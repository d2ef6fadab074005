/**
 * The undecoded query string of `url`: everything after the first `?`, up to
 * a `#`. Empty when the URL has no query.
 */
export function rawQuery(url: string): string {
  const start = url.indexOf("?")
  if (start === -1) return ""

  const end = url.indexOf("#", start)

  return end === -1 ? url.slice(start + 1) : url.slice(start + 1, end)
}
