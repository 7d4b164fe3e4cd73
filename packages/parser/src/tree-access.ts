/**
 * Total field lookups over a DocumentNode tree.
 *
 * Every lookup has a defined result for an absent node. A node that is
 * present but has the wrong shape raises ExtractionError carrying its path.
 */

import type { DocumentNode, MapNode } from '@nfe-intake/contracts';
import { ATTRIBUTE_PREFIX, TEXT_KEY } from '@nfe-intake/contracts';
import { ExtractionError } from '@nfe-intake/shared';

export const EMPTY_MAP: MapNode = { kind: 'map', entries: new Map() };

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function joinPath(parent: string, key: string): string {
  return parent === '' ? key : `${parent}/${key}`;
}

/**
 * Child element that must be a block of fields.
 *
 * Absent or empty elements read as an empty block.
 */
export function block(parent: MapNode, key: string, path: string): MapNode {
  const node = parent.entries.get(key);
  const nodePath = joinPath(path, key);

  if (node === undefined) {
    return EMPTY_MAP;
  }

  switch (node.kind) {
    case 'map':
      return node;
    case 'text':
      if (node.value === '') return EMPTY_MAP;
      throw new ExtractionError(`Expected element block at ${nodePath}, found text`, nodePath);
    case 'list':
      throw new ExtractionError(
        `Expected a single element at ${nodePath}, found ${node.items.length}`,
        nodePath,
      );
  }
}

/**
 * Child element that may repeat. A lone element is normalized to a
 * one-element list; an absent element gives an empty list.
 */
export function blocks(parent: MapNode, key: string, path: string): { node: MapNode; path: string }[] {
  const node = parent.entries.get(key);
  const nodePath = joinPath(path, key);

  if (node === undefined) {
    return [];
  }

  const items: readonly DocumentNode[] = node.kind === 'list' ? node.items : [node];

  return items.map((item, index) => {
    const itemPath = `${nodePath}[${index}]`;
    if (item.kind !== 'map') {
      throw new ExtractionError(`Expected element block at ${itemPath}`, itemPath);
    }
    return { node: item, path: itemPath };
  });
}

/**
 * Character data of a child element or attribute; `''` when absent.
 */
export function text(parent: MapNode, key: string, path: string): string {
  const node = parent.entries.get(key);
  if (node === undefined) {
    return '';
  }

  const value = nodeText(node);
  if (value === null) {
    const nodePath = joinPath(path, key);
    throw new ExtractionError(`Expected text at ${nodePath}`, nodePath);
  }
  return value;
}

/**
 * Attribute value; `''` when absent.
 */
export function attribute(parent: MapNode, name: string, path: string): string {
  return text(parent, `${ATTRIBUTE_PREFIX}${name}`, path);
}

/**
 * Floating-point field. Absent or empty reads as 0.
 */
export function decimal(parent: MapNode, key: string, path: string): number {
  return parseDecimal(text(parent, key, path), joinPath(path, key));
}

export function parseDecimal(raw: string, path: string): number {
  const value = raw.trim();
  if (value === '') {
    return 0;
  }
  if (!DECIMAL_PATTERN.test(value)) {
    throw new ExtractionError(`Invalid number '${value}' at ${path}`, path);
  }
  return Number(value);
}

/**
 * Integer field. Absent or empty reads as 0.
 */
export function integer(parent: MapNode, key: string, path: string): number {
  const value = text(parent, key, path).trim();
  const nodePath = joinPath(path, key);
  if (value === '') {
    return 0;
  }
  if (!INTEGER_PATTERN.test(value)) {
    throw new ExtractionError(`Invalid integer '${value}' at ${nodePath}`, nodePath);
  }
  return parseInt(value, 10);
}

/**
 * `YYYY-MM-DD` date at UTC midnight. Never throws: absent, misshapen or
 * impossible dates read as null.
 */
export function date(parent: MapNode, key: string): Date | null {
  const node = parent.entries.get(key);
  const raw = node === undefined ? null : nodeText(node);
  if (raw === null) {
    return null;
  }
  return parseIsoDate(raw.trim());
}

export function parseIsoDate(value: string): Date | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const result = new Date(Date.UTC(year, month - 1, day));

  if (result.getUTCFullYear() !== year || result.getUTCMonth() !== month - 1 || result.getUTCDate() !== day) {
    return null;
  }
  return result;
}

/**
 * Character data of a node, or null when the node holds no text.
 */
export function nodeText(node: DocumentNode): string | null {
  switch (node.kind) {
    case 'text':
      return node.value;
    case 'map': {
      const inner = node.entries.get(TEXT_KEY);
      if (inner?.kind === 'text') return inner.value;
      // Element carrying only attributes
      return hasChildElements(node) ? null : '';
    }
    case 'list':
      return null;
  }
}

/**
 * Keys of child elements, skipping attributes and character data.
 */
export function elementKeys(node: MapNode): string[] {
  return [...node.entries.keys()].filter((key) => !key.startsWith(ATTRIBUTE_PREFIX) && key !== TEXT_KEY);
}

function hasChildElements(node: MapNode): boolean {
  return elementKeys(node).length > 0;
}
