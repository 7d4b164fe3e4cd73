/**
 * PostgreSQL Document Store
 *
 * Persists extracted NF-e documents into `nfe_header` / `nfe_item`:
 * - Header upserted by access key (last write wins)
 * - Item set deleted and reinserted in the same transaction
 * - Writes serialized through a single-writer limiter
 *
 * Uses the 'pg' driver directly for minimal overhead.
 */

import type { Pool, PoolClient } from 'pg';
import pLimit from 'p-limit';
import type {
  CommitResult,
  DocumentHeader,
  DocumentItem,
  DocumentSource,
  DocumentStore,
  StoredHeader,
  UpsertOptions,
} from '@nfe-intake/contracts';
import { PersistenceError, errorMessage } from '@nfe-intake/shared';
import { assertWritable } from '../guards.js';
import { HEADER_TABLE, ITEM_TABLE, SCHEMA_STATEMENTS } from './schema.js';
import type { HeaderRow, ItemRow, PostgresConfig } from './types.js';
import { rowToDocumentItem, rowToStoredHeader, toSqlDate } from './types.js';

const UPSERT_HEADER_SQL = `
  INSERT INTO ${HEADER_TABLE} (
    access_key, invoice_number, series, issue_date,
    movement_date, operation_nature, issuer_tax_id, issuer_name,
    recipient_tax_id, recipient_name, total_value, icms_value,
    pis_value, cofins_value, file_name, original_path, processed_at
  ) VALUES (
    $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, NOW()
  )
  ON CONFLICT (access_key) DO UPDATE SET
    invoice_number = EXCLUDED.invoice_number,
    series = EXCLUDED.series,
    issue_date = EXCLUDED.issue_date,
    movement_date = EXCLUDED.movement_date,
    operation_nature = EXCLUDED.operation_nature,
    issuer_tax_id = EXCLUDED.issuer_tax_id,
    issuer_name = EXCLUDED.issuer_name,
    recipient_tax_id = EXCLUDED.recipient_tax_id,
    recipient_name = EXCLUDED.recipient_name,
    total_value = EXCLUDED.total_value,
    icms_value = EXCLUDED.icms_value,
    pis_value = EXCLUDED.pis_value,
    cofins_value = EXCLUDED.cofins_value,
    file_name = EXCLUDED.file_name,
    original_path = EXCLUDED.original_path,
    processed_at = EXCLUDED.processed_at
  RETURNING processed_at, (xmax = 0) AS inserted
`;

const DELETE_ITEMS_SQL = `DELETE FROM ${ITEM_TABLE} WHERE access_key = $1`;

const INSERT_ITEM_SQL = `
  INSERT INTO ${ITEM_TABLE} (
    access_key, item_number, product_code, product_description,
    cfop, unit, quantity, unit_value,
    total_value, icms_value, pis_value, cofins_value
  ) VALUES (
    $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12
  )
`;

const SELECT_HEADER_SQL = `
  SELECT
    access_key, invoice_number, series,
    to_char(issue_date, 'YYYY-MM-DD') AS issue_date,
    to_char(movement_date, 'YYYY-MM-DD') AS movement_date,
    operation_nature, issuer_tax_id, issuer_name,
    recipient_tax_id, recipient_name, total_value, icms_value,
    pis_value, cofins_value, file_name, original_path, processed_at
  FROM ${HEADER_TABLE}
  WHERE access_key = $1
`;

const SELECT_ITEMS_SQL = `
  SELECT
    access_key, item_number, product_code, product_description,
    cfop, unit, quantity, unit_value,
    total_value, icms_value, pis_value, cofins_value
  FROM ${ITEM_TABLE}
  WHERE access_key = $1
  ORDER BY item_number ASC, id ASC
`;

/**
 * PostgresDocumentStore implements DocumentStore over a `pg` pool.
 *
 * @example
 * ```typescript
 * import pg from 'pg';
 * import { PostgresDocumentStore } from '@nfe-intake/storage';
 *
 * const pool = new pg.Pool({ connectionString: process.env.DATABASE_URL });
 * const store = new PostgresDocumentStore(pool);
 * await store.initialize();
 *
 * await store.upsertDocument(header, items, {
 *   fileName: 'nota.xml',
 *   originalPath: '2024/05/nota.xml',
 * });
 * ```
 */
export class PostgresDocumentStore implements DocumentStore {
  private pool: Pool;
  private readonly writeLimit = pLimit(1);

  constructor(pool: Pool) {
    this.pool = pool;
  }

  /**
   * Create tables and indexes if they do not exist.
   */
  async initialize(): Promise<void> {
    try {
      for (const statement of SCHEMA_STATEMENTS) {
        await this.pool.query(statement);
      }
    } catch (error) {
      throw new PersistenceError(`Failed to initialize schema: ${errorMessage(error)}`, undefined, error);
    }
  }

  /**
   * Replace header and item set for one access key.
   *
   * IMPORTANT: only one write transaction runs at a time per store; calls
   * queue behind each other in arrival order.
   */
  async upsertDocument(
    header: DocumentHeader,
    items: readonly DocumentItem[],
    source: DocumentSource,
    options?: UpsertOptions,
  ): Promise<CommitResult> {
    assertWritable(header, items);

    // Errors from the caller's hook propagate unchanged
    let hookFailure: { error: unknown } | undefined;

    try {
      return await this.writeLimit(() =>
        this.withTransaction(async (client) => {
          const headerResult = await client.query<{ processed_at: Date; inserted: boolean }>(
            UPSERT_HEADER_SQL,
            [
              header.accessKey,
              header.invoiceNumber,
              header.series,
              toSqlDate(header.issueDate),
              toSqlDate(header.movementDate),
              header.operationNature,
              header.issuerTaxId,
              header.issuerName,
              header.recipientTaxId,
              header.recipientName,
              header.totalValue,
              header.icmsValue,
              header.pisValue,
              header.cofinsValue,
              source.fileName,
              source.originalPath,
            ],
          );
          const written = headerResult.rows[0];
          if (!written) {
            throw new Error('Header upsert returned no row');
          }

          await client.query(DELETE_ITEMS_SQL, [header.accessKey]);

          for (const item of items) {
            await client.query(INSERT_ITEM_SQL, [
              item.accessKey,
              item.itemNumber,
              item.productCode,
              item.productDescription,
              item.cfop,
              item.unit,
              item.quantity,
              item.unitValue,
              item.totalValue,
              item.icmsValue,
              item.pisValue,
              item.cofinsValue,
            ]);
          }

          if (options?.beforeCommit) {
            try {
              await options.beforeCommit();
            } catch (error) {
              hookFailure = { error };
              throw error;
            }
          }

          return {
            accessKey: header.accessKey,
            itemCount: items.length,
            replaced: !written.inserted,
            processedAt: written.processed_at,
          };
        }),
      );
    } catch (error) {
      if (hookFailure) {
        throw hookFailure.error;
      }
      throw new PersistenceError(
        `Failed to store document ${header.accessKey}: ${errorMessage(error)}`,
        { accessKey: header.accessKey },
        error,
      );
    }
  }

  /**
   * Get a header by access key.
   */
  async getHeader(accessKey: string): Promise<StoredHeader | null> {
    const result = await this.pool.query<HeaderRow>(SELECT_HEADER_SQL, [accessKey]);
    const row = result.rows[0];

    if (!row) {
      return null;
    }

    return rowToStoredHeader(row);
  }

  async listItems(accessKey: string): Promise<DocumentItem[]> {
    const result = await this.pool.query<ItemRow>(SELECT_ITEMS_SQL, [accessKey]);
    return result.rows.map(rowToDocumentItem);
  }

  async countHeaders(): Promise<number> {
    const result = await this.pool.query<{ count: string }>(`SELECT COUNT(*) AS count FROM ${HEADER_TABLE}`);
    const row = result.rows[0];
    return row ? parseInt(row.count, 10) : 0;
  }

  /**
   * Execute a function within a transaction.
   */
  async withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Wait for queued writes, then close the pool.
   */
  async close(): Promise<void> {
    await this.writeLimit(() => Promise.resolve());
    await this.pool.end();
  }
}

/**
 * Create a PostgresDocumentStore from a connection string or config.
 */
export async function createPostgresDocumentStore(
  config: PostgresConfig | string,
): Promise<PostgresDocumentStore> {
  // Dynamic import to avoid loading pg when not needed
  const { default: pg } = await import('pg');

  const resolved: PostgresConfig = typeof config === 'string' ? { connectionString: config } : config;

  const pool = new pg.Pool({
    connectionString: resolved.connectionString,
    host: resolved.host,
    port: resolved.port,
    database: resolved.database,
    user: resolved.user,
    password: resolved.password,
    ssl: resolved.ssl,
    max: resolved.poolSize ?? 4,
  });

  return new PostgresDocumentStore(pool);
}
