/* eslint-disable @typescript-eslint/require-await -- DocumentStore interface requires async methods, but memory implementation is synchronous */
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
import { PersistenceError } from '@nfe-intake/shared';
import { assertWritable } from '../guards.js';

/**
 * MemoryDocumentStore keeps headers and items in process memory with the
 * same replace semantics as the PostgreSQL store.
 *
 * Limitations:
 * - Data lost on process restart
 * - Memory bound by process limits
 *
 * Use for:
 * - Tests
 * - Dry runs without a database
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly headers = new Map<string, StoredHeader>();
  private readonly items = new Map<string, DocumentItem[]>();
  private readonly writeLimit = pLimit(1);
  private readonly now: () => Date;
  private closed = false;

  constructor(options?: { now?: () => Date }) {
    this.now = options?.now ?? (() => new Date());
  }

  async initialize(): Promise<void> {
    this.checkClosed();
  }

  async upsertDocument(
    header: DocumentHeader,
    items: readonly DocumentItem[],
    source: DocumentSource,
    options?: UpsertOptions,
  ): Promise<CommitResult> {
    this.checkClosed();
    assertWritable(header, items);

    return this.writeLimit(async () => {
      const processedAt = this.now();
      const stagedHeader: StoredHeader = { ...header, ...source, processedAt };
      const stagedItems = items.map((item) => ({ ...item }));

      // Nothing is visible until the hook has succeeded
      await options?.beforeCommit?.();

      const replaced = this.headers.has(header.accessKey);
      this.headers.set(header.accessKey, stagedHeader);
      this.items.set(header.accessKey, stagedItems);

      return {
        accessKey: header.accessKey,
        itemCount: stagedItems.length,
        replaced,
        processedAt,
      };
    });
  }

  async getHeader(accessKey: string): Promise<StoredHeader | null> {
    const header = this.headers.get(accessKey);
    return header ? { ...header } : null;
  }

  async listItems(accessKey: string): Promise<DocumentItem[]> {
    const items = this.items.get(accessKey) ?? [];
    return items
      .map((item) => ({ ...item }))
      .sort((a, b) => a.itemNumber - b.itemNumber);
  }

  async countHeaders(): Promise<number> {
    return this.headers.size;
  }

  async close(): Promise<void> {
    await this.writeLimit(() => Promise.resolve());
    this.closed = true;
  }

  private checkClosed(): void {
    if (this.closed) {
      throw new PersistenceError('Store is closed');
    }
  }
}
