// =============================================================
// File: server/services/document-sequence.service.ts
// Description: Invoice / purchase numbering. The counter row is
//              incremented inside the caller's transaction, so a
//              rolled-back sale does not burn a number.
// =============================================================

import { Knex } from 'knex';
import { DOCUMENT_NUMBERING } from '../../shared/constants';
import type { DocumentType } from '../../shared/types';
import type { DocumentSequenceRow } from '../database/rows';
import { BaseService } from './base.service';
import { parseNum } from './posting-calculations';

/** Anything that can hand out a unique, monotonic document number */
export interface NextIdGenerator {
  nextId(documentType: DocumentType, db: Knex | Knex.Transaction): Promise<string>;
}

export function formatDocumentNumber(prefix: string, number: number, padding: number): string {
  return `${prefix}${String(number).padStart(padding, '0')}`;
}

class DocumentSequenceService extends BaseService implements NextIdGenerator {
  constructor() {
    super('document_sequences');
  }

  async nextId(documentType: DocumentType, db: Knex | Knex.Transaction): Promise<string> {
    let updated = await this.increment(documentType, db);

    if (updated === 0) {
      const numbering = DOCUMENT_NUMBERING[documentType];
      await db(this.tableName)
        .insert({
          document_type: documentType,
          prefix: numbering.prefix,
          last_number: 0,
          padding: numbering.padding,
        })
        .onConflict('document_type')
        .ignore();
      updated = await this.increment(documentType, db);
    }

    const row: DocumentSequenceRow | undefined = await db(this.tableName)
      .where({ document_type: documentType })
      .first();
    if (updated === 0 || !row) {
      throw new Error(`Document sequence "${documentType}" could not be advanced`);
    }

    return formatDocumentNumber(row.prefix, parseNum(row.last_number), parseNum(row.padding));
  }

  private async increment(documentType: DocumentType, db: Knex | Knex.Transaction): Promise<number> {
    return db(this.tableName).where({ document_type: documentType }).increment('last_number', 1);
  }
}

export const documentSequenceService = new DocumentSequenceService();
