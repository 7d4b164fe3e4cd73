/**
 * Generic document tree produced by the parser.
 *
 * The tree is deliberately schema-agnostic: the extraction engine decides
 * which paths matter and what a missing node means.
 */

/**
 * Element or attribute holding character data.
 */
export interface TextNode {
  kind: 'text';
  value: string;
}

/**
 * Element with child elements and/or attributes.
 *
 * Entry order follows the source document. Attribute keys carry an `@`
 * prefix; character data of an element that also has attributes or
 * children is stored under `#text`.
 */
export interface MapNode {
  kind: 'map';
  entries: ReadonlyMap<string, DocumentNode>;
}

/**
 * Repeated sibling elements sharing one name, in document order.
 */
export interface ListNode {
  kind: 'list';
  items: readonly DocumentNode[];
}

export type DocumentNode = TextNode | MapNode | ListNode;

/**
 * Prefix used for attribute keys inside a MapNode.
 */
export const ATTRIBUTE_PREFIX = '@';

/**
 * Key used for character data inside a MapNode.
 */
export const TEXT_KEY = '#text';
