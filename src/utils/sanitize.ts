/**
 * Helpers for sanitizing values that arrive from servers or callers before
 * they reach the filesystem or a URL
 */

/**
 * Sanitizes a file name for safe use on the local filesystem.
 * Path separators and reserved characters become `_`, leading dots are dropped.
 *
 * @param filename - File name to sanitize
 * @returns Sanitized file name, or an empty string when nothing is left
 */
export function sanitizeFilename(filename: string): string {
  if (!filename) return '';

  // eslint-disable-next-line no-control-regex
  const withoutControl = filename.replace(/[\x00-\x1F\x7F]/g, '');
  const sanitized = withoutControl.replace(/[\/\?<>\\:\*\|"]/g, '_');

  return sanitized.replace(/^\.+/, '');
}

/**
 * Validates a URL and normalizes it, dropping any trailing slash
 *
 * @param url - URL to validate
 * @returns Normalized URL, or an empty string when the URL is invalid or not http(s)
 */
export function sanitizeUrl(url: string): string {
  try {
    const parsedUrl = new URL(url);

    if (!['http:', 'https:'].includes(parsedUrl.protocol)) {
      return '';
    }

    return parsedUrl.toString().replace(/\/+$/, '');
  } catch {
    return '';
  }
}
