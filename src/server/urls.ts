/**
 * Mapping between archive-relative paths and externally resolvable URLs.
 */

export const DOWNLOAD_ROUTE = "/db/";

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/** `<baseUrl>/db/<filePath>`, each path segment percent-encoded. */
export function buildResultUrl(baseUrl: string, filePath: string): string {
  const encoded = filePath
    .split("/")
    .filter((s) => s.length > 0)
    .map(encodeURIComponent)
    .join("/");
  return `${trimTrailingSlash(baseUrl)}${DOWNLOAD_ROUTE}${encoded}`;
}

/**
 * The archive key encoded in a request path such as `/db/a/b.zip`, or null
 * when the path is not a download path or is not valid percent-encoding.
 */
export function archiveKeyFromPath(pathname: string): string | null {
  if (!pathname.startsWith(DOWNLOAD_ROUTE)) return null;
  const rest = pathname.slice(DOWNLOAD_ROUTE.length);
  if (rest.length === 0) return null;
  try {
    return rest.split("/").map(decodeURIComponent).join("/");
  } catch {
    return null;
  }
}
