/**
 * DDL for the document tables.
 *
 * `nfe_item.access_key` references `nfe_header.access_key`; headers are
 * replaced with ON CONFLICT DO UPDATE so the referenced row never disappears
 * mid-transaction.
 */

export const HEADER_TABLE = 'nfe_header';
export const ITEM_TABLE = 'nfe_item';

export const SCHEMA_STATEMENTS: readonly string[] = [
  `
  CREATE TABLE IF NOT EXISTS ${HEADER_TABLE} (
    id                SERIAL PRIMARY KEY,
    access_key        TEXT NOT NULL UNIQUE CHECK (access_key <> ''),
    invoice_number    TEXT,
    series            TEXT,
    issue_date        DATE,
    movement_date     DATE,
    operation_nature  TEXT,
    issuer_tax_id     TEXT,
    issuer_name       TEXT,
    recipient_tax_id  TEXT,
    recipient_name    TEXT,
    total_value       DOUBLE PRECISION,
    icms_value        DOUBLE PRECISION,
    pis_value         DOUBLE PRECISION,
    cofins_value      DOUBLE PRECISION,
    file_name         TEXT,
    original_path     TEXT,
    processed_at      TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
  `,
  `
  CREATE TABLE IF NOT EXISTS ${ITEM_TABLE} (
    id                   SERIAL PRIMARY KEY,
    access_key           TEXT NOT NULL REFERENCES ${HEADER_TABLE} (access_key) ON DELETE CASCADE,
    item_number          INTEGER,
    product_code         TEXT,
    product_description  TEXT,
    cfop                 TEXT,
    unit                 TEXT,
    quantity             DOUBLE PRECISION,
    unit_value           DOUBLE PRECISION,
    total_value          DOUBLE PRECISION,
    icms_value           DOUBLE PRECISION,
    pis_value            DOUBLE PRECISION,
    cofins_value         DOUBLE PRECISION
  )
  `,
  `CREATE INDEX IF NOT EXISTS ${ITEM_TABLE}_access_key_idx ON ${ITEM_TABLE} (access_key)`,
];
