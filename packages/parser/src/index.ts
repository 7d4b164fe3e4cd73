/**
 * @nfe-intake/parser
 *
 * NF-e XML parsing and extraction.
 *
 * - parseDocument: XML bytes to a tagged DocumentNode tree
 * - extractDocument: DocumentNode tree to header and items
 *
 * @packageDocumentation
 */

export { parseDocument, toDocumentNode } from './parse-xml.js';
export { extractDocument, deriveAccessKey, readTaxSubDocument, ACCESS_KEY_PREFIX } from './extract.js';
export { parseIsoDate } from './tree-access.js';
