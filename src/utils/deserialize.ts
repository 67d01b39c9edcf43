import { XMLParser } from 'fast-xml-parser';
import type { ResponseFormat } from '../types/query.js';
import { type SafeWrap, safeWrap } from './wrap.js';

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  ignoreDeclaration: true,
  // Key material and ids must stay strings, e.g. an exponent of "65537"
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

/**
 * Turns a response body into a plain value according to the requested format.
 *
 * - Empty or whitespace-only bodies yield `[null, null]` without attempting to parse.
 * - `json` bodies go through `JSON.parse`.
 * - `xml` bodies are validated and parsed into nested objects keyed by element name,
 *   attributes prefixed with `@_`, all values kept as strings.
 */
export function deserializeBody(text: string, format: ResponseFormat): SafeWrap<Error, unknown> {
  if (!text.trim()) {
    return [null, null];
  }

  if (format === 'json') {
    const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
    if (errJson) {
      return [new Error('error parsing json response body in deserializeBody', { cause: errJson }), null];
    }

    return [null, json];
  }

  const [errXml, xml] = safeWrap((): unknown => xmlParser.parse(text, true));
  if (errXml) {
    return [new Error('error parsing xml response body in deserializeBody', { cause: errXml }), null];
  }

  return [null, xml];
}
