import type { DocumentHeader, DocumentItem } from '@nfe-intake/contracts';
import { PersistenceError } from '@nfe-intake/shared';

/**
 * Reject writes the schema would refuse: an empty access key, or items
 * pointing at a different key than their header.
 */
export function assertWritable(header: DocumentHeader, items: readonly DocumentItem[]): void {
  if (header.accessKey.trim() === '') {
    throw new PersistenceError('Document has an empty access key', {
      invoiceNumber: header.invoiceNumber,
    });
  }

  const foreign = items.find((item) => item.accessKey !== header.accessKey);
  if (foreign) {
    throw new PersistenceError('Item belongs to a different access key than its header', {
      accessKey: header.accessKey,
      itemAccessKey: foreign.accessKey,
      itemNumber: foreign.itemNumber,
    });
  }
}
