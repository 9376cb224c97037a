/**
 * HTTP body and header helpers
 *
 * Multipart bodies for publishing and chunk uploads, and the
 * Content-Disposition parsing that download relies on.
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { sanitizeFilename } from './sanitize';

const CRLF = '\r\n';

/**
 * One part of a multipart/mixed body
 */
export interface MultipartPart {
  /** Value of the `name` parameter in Content-Disposition */
  name: string;
  /** Optional `filename` parameter */
  filename?: string;
  contentType: string;
  body: string | Buffer;
}

/** A request body together with the Content-Type header it must be sent with */
export type RequestBody = [body: Buffer, contentType: string];

/**
 * Generates a boundary that cannot collide with XML payloads
 */
export function createBoundary(): string {
  return uuidv4().replace(/-/g, '');
}

/**
 * Encodes parts as a multipart/mixed body
 *
 * @param parts - Parts in the order they are sent
 * @param boundary - Boundary string, generated when omitted
 * @returns The body and its Content-Type header value
 */
export function buildMultipartBody(
  parts: MultipartPart[],
  boundary: string = createBoundary()
): RequestBody {
  const chunks: Buffer[] = [];

  for (const part of parts) {
    let disposition = `Content-Disposition: name="${part.name}"`;
    if (part.filename !== undefined) {
      disposition += `; filename="${part.filename.replace(/"/g, '')}"`;
    }

    chunks.push(Buffer.from(
      `--${boundary}${CRLF}${disposition}${CRLF}Content-Type: ${part.contentType}${CRLF}${CRLF}`,
      'utf8'
    ));
    chunks.push(typeof part.body === 'string' ? Buffer.from(part.body, 'utf8') : part.body);
    chunks.push(Buffer.from(CRLF, 'utf8'));
  }

  chunks.push(Buffer.from(`--${boundary}--${CRLF}`, 'utf8'));

  return [Buffer.concat(chunks), `multipart/mixed; boundary=${boundary}`];
}

/**
 * Parses a Content-Disposition header into its disposition type and parameters.
 * RFC 5987 extended values (`filename*=UTF-8''...`) are decoded and take
 * precedence over the plain form.
 *
 * @example
 * parseContentDisposition('attachment; filename="Sales.tdsx"');
 * // { type: 'attachment', parameters: { filename: 'Sales.tdsx' } }
 */
export function parseContentDisposition(header: string): {
  type: string;
  parameters: Record<string, string>;
} {
  const [type = '', ...rest] = splitParameters(header);
  const parameters: Record<string, string> = {};
  const extended: Record<string, string> = {};

  for (const segment of rest) {
    const separator = segment.indexOf('=');
    if (separator === -1) continue;

    const key = segment.slice(0, separator).trim().toLowerCase();
    let value = segment.slice(separator + 1).trim();

    if (key.endsWith('*')) {
      const match = /^([\w!#$%&+^`{}~-]+)'[\w-]*'(.*)$/.exec(value);
      const decoded = match ? decodeExtendedValue(match[2]) : undefined;
      if (decoded !== undefined) {
        extended[key.slice(0, -1)] = decoded;
      }
      continue;
    }

    if (value.startsWith('"') && value.endsWith('"') && value.length >= 2) {
      value = value.slice(1, -1).replace(/\\(.)/g, '$1');
    }
    parameters[key] = value;
  }

  return {
    type: type.trim().toLowerCase(),
    parameters: { ...parameters, ...extended }
  };
}

// Malformed percent-encoding falls back to the plain parameter
function decodeExtendedValue(value: string): string | undefined {
  try {
    return decodeURIComponent(value);
  } catch {
    return undefined;
  }
}

// Splits on `;` outside quoted strings
function splitParameters(header: string): string[] {
  const segments: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < header.length; i++) {
    const char = header[i];
    if (char === '\\' && quoted && i + 1 < header.length) {
      current += char + header[i + 1];
      i++;
      continue;
    }
    if (char === '"') quoted = !quoted;
    if (char === ';' && !quoted) {
      segments.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  segments.push(current);

  return segments;
}

/**
 * Extracts a filesystem-safe base name from a Content-Disposition header
 *
 * @returns The file name, or undefined when the header names none
 */
export function filenameFromContentDisposition(header: string | null | undefined): string | undefined {
  if (!header) return undefined;

  const { parameters } = parseContentDisposition(header);
  if (!parameters.filename) return undefined;

  const base = path.posix.basename(parameters.filename.replace(/\\/g, '/'));
  const safe = sanitizeFilename(base);
  return safe || undefined;
}

/**
 * Formats bytes to a human-readable string
 */
export function formatBytes(bytes: number, decimals: number = 2): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return parseFloat((bytes / Math.pow(k, i)).toFixed(decimals)) + ' ' + sizes[i];
}
