/**
 * @nfe-intake/storage
 *
 * DocumentStore implementations for nfe-intake.
 *
 * @packageDocumentation
 */

// PostgreSQL storage
export { PostgresDocumentStore, createPostgresDocumentStore } from './postgres/document-repository.js';
export { SCHEMA_STATEMENTS, HEADER_TABLE, ITEM_TABLE } from './postgres/schema.js';
export { maskConnectionString, type PostgresConfig } from './postgres/types.js';

// In-memory storage
export { MemoryDocumentStore } from './memory/memory-document-store.js';

// Re-export types from contracts
export type {
  DocumentStore,
  DocumentSource,
  StoredHeader,
  CommitResult,
  UpsertOptions,
} from '@nfe-intake/contracts';
