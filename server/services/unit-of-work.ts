// =============================================================
// File: server/services/unit-of-work.ts
// Description: Transaction coordinator. Every posting operation
//              runs its writes through runUnitOfWork():
//                ok result   → commit
//                err result  → rollback, error returned as-is
//                throw       → rollback, retried if transient,
//                              otherwise STORAGE_FAILURE
// =============================================================

import { setTimeout as sleep } from 'timers/promises';
import { Knex } from 'knex';
import { getEnv } from '../config/env';
import { getDb } from '../database/connection';
import { unitOfWorkLogger } from '../lib/logger';
import { TRANSIENT_STORAGE_ERROR_CODES } from '../../shared/constants';
import { err, ok, Result, StorageFailure } from '../../shared/types';

export interface UnitOfWorkOptions {
  db?: Knex;
  /** Only pg gets SET LOCAL lock_timeout */
  dialect?: 'pg' | 'better-sqlite3';
  maxRetries?: number;
  retryDelayMs?: number;
  lockTimeoutMs?: number;
  /** Shows up in retry / failure log lines */
  label?: string;
}

export type UnitOfWork<T, E> = (trx: Knex.Transaction) => Promise<Result<T, E>>;

// Thrown out of the knex transaction callback so knex rolls back;
// the typed error travels beside it.
class RollbackSignal extends Error {
  constructor() {
    super('Unit of work rolled back');
    this.name = 'RollbackSignal';
  }
}

export function driverErrorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

export function isTransientStorageError(error: unknown): boolean {
  const code = driverErrorCode(error);
  return code !== null && TRANSIENT_STORAGE_ERROR_CODES.includes(code);
}

export function toStorageFailure(error: unknown, retryable = false): StorageFailure {
  return {
    code: 'STORAGE_FAILURE',
    message: error instanceof Error ? error.message : String(error),
    retryable,
    driver_code: driverErrorCode(error),
  };
}

export async function runUnitOfWork<T, E>(
  work: UnitOfWork<T, E>,
  options: UnitOfWorkOptions = {}
): Promise<Result<T, E | StorageFailure>> {
  const env = getEnv();
  const db = options.db ?? getDb();
  const dialect = options.dialect ?? env.DB_CLIENT;
  const maxRetries = options.maxRetries ?? env.UNIT_OF_WORK_MAX_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? env.UNIT_OF_WORK_RETRY_DELAY_MS;
  const lockTimeoutMs = options.lockTimeoutMs ?? env.UNIT_OF_WORK_LOCK_TIMEOUT_MS;
  const label = options.label ?? 'unit-of-work';

  for (let attempt = 0; ; attempt++) {
    const rejected: { error: E | null } = { error: null };

    try {
      const value = await db.transaction(async (trx) => {
        if (dialect === 'pg' && lockTimeoutMs > 0) {
          await trx.raw(`SET LOCAL lock_timeout = ${Math.floor(lockTimeoutMs)}`);
        }
        const result = await work(trx);
        if (!result.ok) {
          rejected.error = result.error;
          throw new RollbackSignal();
        }
        return result.value;
      });
      return ok(value);
    } catch (error) {
      if (error instanceof RollbackSignal && rejected.error !== null) {
        return err(rejected.error);
      }

      if (!isTransientStorageError(error)) {
        unitOfWorkLogger.error({ err: error, label }, 'Unit of work failed');
        return err(toStorageFailure(error, false));
      }

      if (attempt >= maxRetries) {
        unitOfWorkLogger.error({ err: error, label, attempts: attempt + 1 }, 'Unit of work gave up after retries');
        return err(toStorageFailure(error, true));
      }

      const delay = retryDelayMs * 2 ** attempt;
      unitOfWorkLogger.warn(
        { label, attempt: attempt + 1, driver_code: driverErrorCode(error), delay },
        'Transient storage error, retrying'
      );
      await sleep(delay);
    }
  }
}
