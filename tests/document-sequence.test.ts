import { describe, it, expect, beforeEach } from 'vitest';
import { documentSequenceService, formatDocumentNumber } from '../server/services/document-sequence.service';
import { cleanAllData, getTestDb } from './setup';

describe('Document numbering', () => {
  beforeEach(async () => {
    await cleanAllData();
  });

  it('formats prefix and zero-padded number', () => {
    expect(formatDocumentNumber('INV', 1, 3)).toBe('INV001');
    expect(formatDocumentNumber('PUR', 42, 3)).toBe('PUR042');
    expect(formatDocumentNumber('INV', 1000, 3)).toBe('INV1000');
  });

  it('hands out consecutive numbers per document type', async () => {
    const db = getTestDb();

    expect(await documentSequenceService.nextId('invoice', db)).toBe('INV001');
    expect(await documentSequenceService.nextId('invoice', db)).toBe('INV002');
    expect(await documentSequenceService.nextId('purchase', db)).toBe('PUR001');
  });

  it('recreates a missing sequence row', async () => {
    const db = getTestDb();
    await db('document_sequences').where('document_type', 'purchase').delete();

    expect(await documentSequenceService.nextId('purchase', db)).toBe('PUR001');
    expect(await documentSequenceService.nextId('purchase', db)).toBe('PUR002');
  });

  it('gives a number back when the transaction rolls back', async () => {
    const db = getTestDb();

    await expect(
      db.transaction(async (trx) => {
        await documentSequenceService.nextId('invoice', trx);
        throw new Error('abandon');
      })
    ).rejects.toThrow('abandon');

    expect(await documentSequenceService.nextId('invoice', db)).toBe('INV001');
  });
});
