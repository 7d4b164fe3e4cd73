import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { DocumentHeader, DocumentItem } from '@nfe-intake/contracts';
import { PersistenceError } from '@nfe-intake/shared';
import { MemoryDocumentStore } from './memory-document-store.js';

const KEY = '35200714200166000187550010000000046550010466';
const PROCESSED_AT = new Date('2024-05-01T12:00:00.000Z');

function header(overrides: Partial<DocumentHeader> = {}): DocumentHeader {
  return {
    accessKey: KEY,
    invoiceNumber: '4',
    series: '1',
    issueDate: new Date(Date.UTC(2020, 6, 14)),
    movementDate: null,
    operationNature: 'VENDA',
    issuerTaxId: '14200166000187',
    issuerName: 'Fornecedor Teste Ltda',
    recipientTaxId: '',
    recipientName: '',
    totalValue: 25,
    icmsValue: 4.5,
    pisValue: 0,
    cofinsValue: 0,
    ...overrides,
  };
}

function item(itemNumber: number, overrides: Partial<DocumentItem> = {}): DocumentItem {
  return {
    accessKey: KEY,
    itemNumber,
    productCode: `P-${itemNumber}`,
    productDescription: 'Produto',
    cfop: '5102',
    unit: 'UN',
    quantity: 1,
    unitValue: 10,
    totalValue: 10,
    icmsValue: 0,
    pisValue: 0,
    cofinsValue: 0,
    ...overrides,
  };
}

const source = { fileName: 'nota.xml', originalPath: 'sub/nota.xml' };

describe('MemoryDocumentStore', () => {
  let store: MemoryDocumentStore;

  beforeEach(async () => {
    store = new MemoryDocumentStore({ now: () => PROCESSED_AT });
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
  });

  describe('upsertDocument', () => {
    it('should store header with provenance and processing time', async () => {
      const result = await store.upsertDocument(header(), [item(1)], source);

      expect(result).toEqual({ accessKey: KEY, itemCount: 1, replaced: false, processedAt: PROCESSED_AT });
      expect(await store.getHeader(KEY)).toEqual({
        ...header(),
        fileName: 'nota.xml',
        originalPath: 'sub/nota.xml',
        processedAt: PROCESSED_AT,
      });
    });

    it('should replace the header and the whole item set on re-ingestion', async () => {
      await store.upsertDocument(header(), [item(1), item(2), item(3)], source);

      const result = await store.upsertDocument(
        header({ totalValue: 99 }),
        [item(7, { productCode: 'NEW' })],
        { fileName: 'nota_v2.xml', originalPath: 'nota_v2.xml' },
      );

      expect(result.replaced).toBe(true);
      expect((await store.getHeader(KEY))?.totalValue).toBe(99);
      expect((await store.getHeader(KEY))?.fileName).toBe('nota_v2.xml');
      expect((await store.listItems(KEY)).map((i) => i.productCode)).toEqual(['NEW']);
      expect(await store.countHeaders()).toBe(1);
    });

    it('should allow a document without items', async () => {
      await store.upsertDocument(header(), [], source);

      expect(await store.listItems(KEY)).toEqual([]);
      expect(await store.countHeaders()).toBe(1);
    });

    it('should reject an empty access key', async () => {
      await expect(store.upsertDocument(header({ accessKey: '' }), [], source)).rejects.toThrow(PersistenceError);
      expect(await store.countHeaders()).toBe(0);
    });

    it('should reject items of another access key', async () => {
      await expect(
        store.upsertDocument(header(), [item(1, { accessKey: 'other' })], source),
      ).rejects.toThrow(PersistenceError);
    });

    it('should roll back when the beforeCommit hook fails', async () => {
      await store.upsertDocument(header(), [item(1), item(2)], source);
      const hookError = new Error('move failed');

      await expect(
        store.upsertDocument(header({ totalValue: 1 }), [item(9)], source, {
          beforeCommit: () => Promise.reject(hookError),
        }),
      ).rejects.toBe(hookError);

      expect((await store.getHeader(KEY))?.totalValue).toBe(25);
      expect((await store.listItems(KEY)).map((i) => i.itemNumber)).toEqual([1, 2]);
    });

    it('should run writes one at a time', async () => {
      const trace: string[] = [];
      const slowHook = (name: string) => async () => {
        trace.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, 10));
        trace.push(`${name}:end`);
      };

      await Promise.all([
        store.upsertDocument(header(), [item(1)], source, { beforeCommit: slowHook('a') }),
        store.upsertDocument(header({ accessKey: 'k2' }), [], source, { beforeCommit: slowHook('b') }),
      ]);

      expect(trace).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });

    it('should keep the later of two writes for the same key', async () => {
      await Promise.all([
        store.upsertDocument(header({ invoiceNumber: 'first' }), [item(1)], source),
        store.upsertDocument(header({ invoiceNumber: 'second' }), [item(2)], source),
      ]);

      expect((await store.getHeader(KEY))?.invoiceNumber).toBe('second');
      expect((await store.listItems(KEY)).map((i) => i.itemNumber)).toEqual([2]);
    });
  });

  describe('reads', () => {
    it('should return null for an unknown key', async () => {
      expect(await store.getHeader('missing')).toBeNull();
    });

    it('should list items ordered by item number', async () => {
      await store.upsertDocument(header(), [item(3), item(1), item(2)], source);

      expect((await store.listItems(KEY)).map((i) => i.itemNumber)).toEqual([1, 2, 3]);
    });

    it('should not expose internal state', async () => {
      await store.upsertDocument(header(), [item(1)], source);
      const items = await store.listItems(KEY);
      const first = items[0];
      if (first) first.productCode = 'mutated';

      expect((await store.listItems(KEY))[0]?.productCode).toBe('P-1');
    });
  });

  it('should refuse writes after close', async () => {
    const closing = new MemoryDocumentStore();
    await closing.close();

    await expect(closing.upsertDocument(header(), [], source)).rejects.toThrow(PersistenceError);
  });
});
