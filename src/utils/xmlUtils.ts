/**
 * XML utilities for server request and response bodies
 *
 * Responses are parsed with attributes kept under an `@_` prefix and every
 * attribute left as a string. Elements that may repeat are always parsed as
 * arrays so a single match and many matches read the same way.
 */

import { XMLParser, XMLBuilder, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { ResponseParseError } from '../core/errors';

/** Elements that always parse to arrays */
const ARRAY_ELEMENTS = new Set(['datasource', 'connection', 'tag']);

const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  ignoreDeclaration: true,
  removeNSPrefix: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName: string, _jPath: string, _isLeafNode: boolean, isAttribute: boolean) =>
    !isAttribute && ARRAY_ELEMENTS.has(tagName)
};

const BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  format: false,
  suppressEmptyNode: true
};

/**
 * Parses an XML document, failing on malformed input
 *
 * @throws ResponseParseError when the document is not well formed
 */
export function parseXml(xml: string): unknown {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new ResponseParseError(
      `Failed to parse XML: ${validation.err.msg}`,
      { line: validation.err.line, column: validation.err.col }
    );
  }

  return new XMLParser(PARSER_OPTIONS).parse(xml);
}

/**
 * Builds an XML document from an object in the parser's `@_` attribute notation
 *
 * @example
 * buildXml({ tsRequest: { datasource: { '@_name': 'Sales' } } });
 * // <tsRequest><datasource name="Sales"/></tsRequest>
 */
export function buildXml(obj: Record<string, unknown>): string {
  return new XMLBuilder(BUILDER_OPTIONS).build(obj);
}

/**
 * Wraps an element schema so a self-closing element, which parses to an
 * empty string, validates as an empty object
 */
export function element<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (value === '' ? {} : value), schema);
}

const tsResponseShape = z.object({ tsResponse: z.unknown() });

/**
 * Parses a server response body and validates its `tsResponse` root against `schema`
 *
 * @throws ResponseParseError when the body is malformed or has an unexpected shape
 */
export function parseTsResponse<T>(
  body: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  const document = tsResponseShape.safeParse(parseXml(body));
  if (!document.success || document.data.tsResponse === undefined) {
    throw new ResponseParseError('Response is missing the tsResponse root element');
  }

  const root = document.data.tsResponse === '' ? {} : document.data.tsResponse;
  const parsed = schema.safeParse(root);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `'${issue.path.join('.')}': ${issue.message}`)
      .join('; ');
    throw new ResponseParseError(`Unexpected response shape: ${issues}`);
  }

  return parsed.data;
}
