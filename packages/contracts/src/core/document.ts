/**
 * NF-e records extracted from one XML document.
 */

/**
 * Summary row for one fiscal document, keyed by its access key.
 */
export interface DocumentHeader {
  /**
   * 44-digit access key (chave de acesso), taken from the `infNFe/@Id`
   * attribute without its `NFe` prefix.
   */
  accessKey: string;
  invoiceNumber: string;
  series: string;
  /** `ide/dEmi`, null when absent or unparsable */
  issueDate: Date | null;
  /** `ide/dSaiEnt`, null when absent or unparsable */
  movementDate: Date | null;
  /** `ide/natOp` */
  operationNature: string;
  issuerTaxId: string;
  issuerName: string;
  recipientTaxId: string;
  recipientName: string;
  /** `ICMSTot/vNF` */
  totalValue: number;
  icmsValue: number;
  pisValue: number;
  cofinsValue: number;
}

/**
 * One product line (`det`) of a fiscal document.
 */
export interface DocumentItem {
  accessKey: string;
  itemNumber: number;
  productCode: string;
  productDescription: string;
  cfop: string;
  unit: string;
  quantity: number;
  unitValue: number;
  totalValue: number;
  icmsValue: number;
  pisValue: number;
  cofinsValue: number;
}

/**
 * Result of running the extraction engine over a document tree.
 */
export interface ExtractedDocument {
  header: DocumentHeader;
  items: DocumentItem[];
}

/**
 * Taxes carried per item, each wrapped in a regime-specific element
 * (`ICMS/ICMS00`, `PIS/PISAliq`, `COFINS/COFINSOutr`, ...).
 */
export type TaxName = 'ICMS' | 'PIS' | 'COFINS';

/**
 * A per-item tax block, resolved to the regime variant it carries.
 */
export type TaxSubDocument =
  | {
      kind: 'variant';
      /** Element name of the variant, e.g. `ICMS00` */
      regime: string;
      fields: ReadonlyMap<string, string>;
    }
  | { kind: 'absent' };
