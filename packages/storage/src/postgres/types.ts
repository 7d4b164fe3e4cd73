/**
 * PostgreSQL row types and conversions.
 */

import type { DocumentItem, StoredHeader } from '@nfe-intake/contracts';

/**
 * Row returned from the header table. Dates are selected as `YYYY-MM-DD`
 * text so the driver does not shift them into the local time zone.
 */
export interface HeaderRow {
  access_key: string;
  invoice_number: string | null;
  series: string | null;
  issue_date: string | null;
  movement_date: string | null;
  operation_nature: string | null;
  issuer_tax_id: string | null;
  issuer_name: string | null;
  recipient_tax_id: string | null;
  recipient_name: string | null;
  total_value: number | null;
  icms_value: number | null;
  pis_value: number | null;
  cofins_value: number | null;
  file_name: string | null;
  original_path: string | null;
  processed_at: Date;
}

/**
 * Row returned from the item table.
 */
export interface ItemRow {
  access_key: string;
  item_number: number | null;
  product_code: string | null;
  product_description: string | null;
  cfop: string | null;
  unit: string | null;
  quantity: number | null;
  unit_value: number | null;
  total_value: number | null;
  icms_value: number | null;
  pis_value: number | null;
  cofins_value: number | null;
}

/**
 * PostgreSQL connection configuration.
 */
export interface PostgresConfig {
  connectionString?: string | undefined;
  host?: string | undefined;
  port?: number | undefined;
  database?: string | undefined;
  user?: string | undefined;
  password?: string | undefined;
  ssl?: boolean | { rejectUnauthorized: boolean } | undefined;
  poolSize?: number | undefined;
}

/**
 * `YYYY-MM-DD` for a UTC-midnight date, as bound to a DATE column.
 */
export function toSqlDate(date: Date | null): string | null {
  return date === null ? null : date.toISOString().slice(0, 10);
}

export function fromSqlDate(value: string | null): Date | null {
  return value === null ? null : new Date(`${value}T00:00:00.000Z`);
}

/**
 * Convert database row to StoredHeader.
 */
export function rowToStoredHeader(row: HeaderRow): StoredHeader {
  return {
    accessKey: row.access_key,
    invoiceNumber: row.invoice_number ?? '',
    series: row.series ?? '',
    issueDate: fromSqlDate(row.issue_date),
    movementDate: fromSqlDate(row.movement_date),
    operationNature: row.operation_nature ?? '',
    issuerTaxId: row.issuer_tax_id ?? '',
    issuerName: row.issuer_name ?? '',
    recipientTaxId: row.recipient_tax_id ?? '',
    recipientName: row.recipient_name ?? '',
    totalValue: row.total_value ?? 0,
    icmsValue: row.icms_value ?? 0,
    pisValue: row.pis_value ?? 0,
    cofinsValue: row.cofins_value ?? 0,
    fileName: row.file_name ?? '',
    originalPath: row.original_path ?? '',
    processedAt: row.processed_at,
  };
}

/**
 * Convert database row to DocumentItem.
 */
export function rowToDocumentItem(row: ItemRow): DocumentItem {
  return {
    accessKey: row.access_key,
    itemNumber: row.item_number ?? 0,
    productCode: row.product_code ?? '',
    productDescription: row.product_description ?? '',
    cfop: row.cfop ?? '',
    unit: row.unit ?? '',
    quantity: row.quantity ?? 0,
    unitValue: row.unit_value ?? 0,
    totalValue: row.total_value ?? 0,
    icmsValue: row.icms_value ?? 0,
    pisValue: row.pis_value ?? 0,
    cofinsValue: row.cofins_value ?? 0,
  };
}

/**
 * Connection string with the password replaced, for logs.
 */
export function maskConnectionString(connectionString: string): string {
  return connectionString.replace(/^([a-z][a-z0-9+.-]*:\/\/[^:/@]+:)[^@]*@/i, '$1****@');
}
