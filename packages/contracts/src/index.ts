/**
 * @nfe-intake/contracts
 *
 * Types and interfaces for the NF-e intake packages.
 * This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/document.js';
export * from './core/document-tree.js';

// Storage
export * from './storage/document-store.js';

// Ingestion
export * from './ingest/watch.js';
export * from './ingest/outcome.js';

// Configuration
export * from './config/intake-config.js';
export * from './logging/log-level.js';
