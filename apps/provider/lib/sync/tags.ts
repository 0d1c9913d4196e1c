/**
 * Encode object tags as a URL query string (`k1=v1&k2=v2`), the form S3 takes in
 * the x-amz-tagging header. Keys are sorted so equal maps encode identically.
 */
export function encodeTags(tags: Record<string, string>): string {
  const params = new URLSearchParams()
  for (const key of Object.keys(tags).sort()) {
    params.append(key, tags[key])
  }
  return params.toString()
}
