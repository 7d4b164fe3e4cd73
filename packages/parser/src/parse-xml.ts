/**
 * XML to DocumentNode parser
 *
 * Wraps fast-xml-parser and converts its loosely typed output into the
 * tagged DocumentNode tree. Text is never coerced to numbers: access keys
 * are 44 digits long and item codes keep their leading zeros.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { DocumentNode, MapNode } from '@nfe-intake/contracts';
import { ATTRIBUTE_PREFIX, TEXT_KEY } from '@nfe-intake/contracts';
import { ParseError } from '@nfe-intake/shared';

const decoder = new TextDecoder('utf-8', { fatal: true });

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new ParseError('Document is not valid UTF-8', undefined, error);
  }
}

/**
 * Parse raw document bytes into a DocumentNode tree.
 *
 * The returned root is a map holding the document element. Repeated sibling
 * elements become a list; a lone element stays a single node.
 *
 * @throws ParseError on invalid UTF-8, malformed markup or a document without elements
 */
export function parseDocument(input: string | Uint8Array): MapNode {
  const xml = typeof input === 'string' ? input : decodeUtf8(input);

  if (xml.trim().length === 0) {
    throw new ParseError('Document is empty');
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    throw new ParseError(`Malformed XML: ${msg}`, { code, line, col });
  }

  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (error) {
    throw new ParseError('Malformed XML', undefined, error);
  }

  const root = toDocumentNode(parsed);
  if (root.kind !== 'map' || root.entries.size === 0) {
    throw new ParseError('No root element found in XML');
  }

  return root;
}

/**
 * Convert fast-xml-parser output into a DocumentNode.
 */
export function toDocumentNode(value: unknown): DocumentNode {
  if (Array.isArray(value)) {
    return { kind: 'list', items: value.map(toDocumentNode) };
  }

  if (value !== null && typeof value === 'object') {
    const entries = new Map<string, DocumentNode>();
    for (const [key, child] of Object.entries(value)) {
      if (isNamespaceDeclaration(key)) continue;
      entries.set(key, toDocumentNode(child));
    }
    return { kind: 'map', entries };
  }

  if (value === null || value === undefined) {
    return { kind: 'text', value: '' };
  }

  return { kind: 'text', value: String(value) };
}

function isNamespaceDeclaration(key: string): boolean {
  return (
    key === ATTRIBUTE_PREFIX ||
    key === `${ATTRIBUTE_PREFIX}xmlns` ||
    key.startsWith(`${ATTRIBUTE_PREFIX}xmlns:`)
  );
}
