/**
 * NF-e extraction engine
 *
 * Maps a parsed NF-e tree into one DocumentHeader and its DocumentItems.
 * Layout followed: NFe → infNFe → ide / emit / dest / total/ICMSTot / det[].
 */

import type {
  DocumentItem,
  DocumentHeader,
  ExtractedDocument,
  MapNode,
  TaxName,
  TaxSubDocument,
} from '@nfe-intake/contracts';
import {
  EMPTY_MAP,
  attribute,
  block,
  blocks,
  date,
  decimal,
  elementKeys,
  integer,
  joinPath,
  nodeText,
  parseDecimal,
  text,
} from './tree-access.js';

/**
 * Prefix of the `infNFe/@Id` attribute in front of the access key.
 */
export const ACCESS_KEY_PREFIX = 'NFe';

/**
 * Value field read from each tax's variant element.
 */
const TAX_VALUE_FIELDS: Record<TaxName, string> = {
  ICMS: 'vICMS',
  PIS: 'vPIS',
  COFINS: 'vCOFINS',
};

/**
 * Extract header and items from a parsed NF-e document.
 *
 * The document element may be `NFe` or the authorized envelope
 * `nfeProc/NFe`. Absent blocks yield defaults (`''`, 0, null); blocks with
 * an unexpected shape and non-numeric amounts raise.
 *
 * @throws ExtractionError
 */
export function extractDocument(tree: MapNode): ExtractedDocument {
  const { nfe, path: nfePath } = locateNfe(tree);

  const infNfePath = joinPath(nfePath, 'infNFe');
  const infNfe = block(nfe, 'infNFe', nfePath);

  const ide = block(infNfe, 'ide', infNfePath);
  const emit = block(infNfe, 'emit', infNfePath);
  const dest = block(infNfe, 'dest', infNfePath);
  const totalPath = joinPath(infNfePath, 'total');
  const icmsTotPath = joinPath(totalPath, 'ICMSTot');
  const icmsTot = block(block(infNfe, 'total', infNfePath), 'ICMSTot', totalPath);

  const accessKey = deriveAccessKey(attribute(infNfe, 'Id', infNfePath));

  const header: DocumentHeader = {
    accessKey,
    invoiceNumber: text(ide, 'nNF', joinPath(infNfePath, 'ide')),
    series: text(ide, 'serie', joinPath(infNfePath, 'ide')),
    issueDate: date(ide, 'dEmi'),
    movementDate: date(ide, 'dSaiEnt'),
    operationNature: text(ide, 'natOp', joinPath(infNfePath, 'ide')),
    issuerTaxId: text(emit, 'CNPJ', joinPath(infNfePath, 'emit')),
    issuerName: text(emit, 'xNome', joinPath(infNfePath, 'emit')),
    recipientTaxId: text(dest, 'CNPJ', joinPath(infNfePath, 'dest')),
    recipientName: text(dest, 'xNome', joinPath(infNfePath, 'dest')),
    totalValue: decimal(icmsTot, 'vNF', icmsTotPath),
    icmsValue: decimal(icmsTot, 'vICMS', icmsTotPath),
    pisValue: decimal(icmsTot, 'vPIS', icmsTotPath),
    cofinsValue: decimal(icmsTot, 'vCOFINS', icmsTotPath),
  };

  const items = blocks(infNfe, 'det', infNfePath).map(({ node, path }) =>
    extractItem(node, path, accessKey),
  );

  return { header, items };
}

/**
 * Strip the fixed `NFe` prefix from the identifier attribute.
 *
 * An identifier without the prefix is returned unchanged; an empty
 * identifier gives an empty key, which stores refuse.
 */
export function deriveAccessKey(id: string): string {
  return id.startsWith(ACCESS_KEY_PREFIX) ? id.slice(ACCESS_KEY_PREFIX.length) : id;
}

function extractItem(det: MapNode, path: string, accessKey: string): DocumentItem {
  const prodPath = joinPath(path, 'prod');
  const prod = block(det, 'prod', path);
  const impostoPath = joinPath(path, 'imposto');
  const imposto = block(det, 'imposto', path);

  return {
    accessKey,
    itemNumber: integer(det, '@nItem', path),
    productCode: text(prod, 'cProd', prodPath),
    productDescription: text(prod, 'xProd', prodPath),
    cfop: text(prod, 'CFOP', prodPath),
    unit: text(prod, 'uCom', prodPath),
    quantity: decimal(prod, 'qCom', prodPath),
    unitValue: decimal(prod, 'vUnCom', prodPath),
    totalValue: decimal(prod, 'vProd', prodPath),
    icmsValue: taxValue(readTaxSubDocument(imposto, 'ICMS'), 'ICMS', impostoPath),
    pisValue: taxValue(readTaxSubDocument(imposto, 'PIS'), 'PIS', impostoPath),
    cofinsValue: taxValue(readTaxSubDocument(imposto, 'COFINS'), 'COFINS', impostoPath),
  };
}

/**
 * Resolve a tax block to the regime variant it wraps.
 *
 * The first child element of the block is taken as the variant whatever its
 * name, so new regimes need no code change. A block without a child element,
 * or whose variant is not an element block, resolves to `absent`.
 */
export function readTaxSubDocument(imposto: MapNode, tax: TaxName): TaxSubDocument {
  const node = imposto.entries.get(tax);
  if (node?.kind !== 'map') {
    return { kind: 'absent' };
  }

  const regime = elementKeys(node)[0];
  const variant = regime === undefined ? undefined : node.entries.get(regime);
  if (regime === undefined || variant?.kind !== 'map') {
    return { kind: 'absent' };
  }

  const fields = new Map<string, string>();
  for (const key of elementKeys(variant)) {
    const child = variant.entries.get(key);
    const value = child === undefined ? null : nodeText(child);
    if (value !== null) {
      fields.set(key, value);
    }
  }

  return { kind: 'variant', regime, fields };
}

function taxValue(sub: TaxSubDocument, tax: TaxName, impostoPath: string): number {
  if (sub.kind === 'absent') {
    return 0;
  }
  const field = TAX_VALUE_FIELDS[tax];
  const raw = sub.fields.get(field) ?? '';
  return parseDecimal(raw, `${impostoPath}/${tax}/${sub.regime}/${field}`);
}

function locateNfe(tree: MapNode): { nfe: MapNode; path: string } {
  if (tree.entries.has('NFe')) {
    return { nfe: block(tree, 'NFe', ''), path: 'NFe' };
  }
  if (tree.entries.has('nfeProc')) {
    const nfeProc = block(tree, 'nfeProc', '');
    return { nfe: block(nfeProc, 'NFe', 'nfeProc'), path: 'nfeProc/NFe' };
  }
  return { nfe: EMPTY_MAP, path: 'NFe' };
}
