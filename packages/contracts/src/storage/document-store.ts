import type { DocumentHeader, DocumentItem } from '../core/document.js';

/**
 * File provenance recorded with each header.
 */
export interface DocumentSource {
  /** Base name of the ingested file */
  fileName: string;
  /** Path relative to the watched root */
  originalPath: string;
}

/**
 * Header as read back from a store.
 */
export interface StoredHeader extends DocumentHeader, DocumentSource {
  /** Set by the store when the header was written */
  processedAt: Date;
}

export interface UpsertOptions {
  /**
   * Runs inside the write transaction after the rows are staged and before
   * they are committed. A rejection rolls the write back and propagates.
   */
  beforeCommit?: () => Promise<void>;
}

export interface CommitResult {
  accessKey: string;
  itemCount: number;
  /** True when an existing header with the same key was replaced */
  replaced: boolean;
  processedAt: Date;
}

/**
 * Relational store for extracted documents.
 *
 * Implementations:
 * - PostgresDocumentStore: `pg` pool backed
 * - MemoryDocumentStore: in-process, for tests and dry runs
 *
 * Writes are serialized by the implementation; callers may invoke
 * `upsertDocument` concurrently.
 */
export interface DocumentStore {
  /**
   * Create tables if they do not exist.
   */
  initialize(): Promise<void>;

  /**
   * Replace the header for `header.accessKey` and its full item set in one
   * transaction (last write wins).
   *
   * @throws PersistenceError when the write fails or the access key is empty
   */
  upsertDocument(
    header: DocumentHeader,
    items: readonly DocumentItem[],
    source: DocumentSource,
    options?: UpsertOptions,
  ): Promise<CommitResult>;

  getHeader(accessKey: string): Promise<StoredHeader | null>;

  /**
   * Items for a key, ordered by item number.
   */
  listItems(accessKey: string): Promise<DocumentItem[]>;

  countHeaders(): Promise<number>;

  close(): Promise<void>;
}
