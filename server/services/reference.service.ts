import { Knex } from 'knex';
import { BaseService } from './base.service';

/**
 * Existence checks against the reference tables. Read-only; the rows
 * themselves are maintained elsewhere.
 */
class ReferenceService extends BaseService {
  constructor() {
    super('products');
  }

  async customerExists(customerId: string, db: Knex = this.db): Promise<boolean> {
    return this.exists(db, 'customers', 'customer_id', customerId);
  }

  async employeeExists(employeeId: string, db: Knex = this.db): Promise<boolean> {
    return this.exists(db, 'employees', 'employee_id', employeeId);
  }

  async supplierExists(supplierId: string, db: Knex = this.db): Promise<boolean> {
    return this.exists(db, 'suppliers', 'supplier_id', supplierId);
  }

  /** Codes with no products row, in the order they were given */
  async findMissingProducts(productCodes: string[], db: Knex = this.db): Promise<string[]> {
    if (productCodes.length === 0) return [];

    const rows: Array<{ product_code: string }> = await db(this.tableName)
      .whereIn('product_code', productCodes)
      .select('product_code');
    const found = new Set(rows.map((r) => r.product_code));

    return productCodes.filter((code) => !found.has(code));
  }

  private async exists(db: Knex, table: string, column: string, value: string): Promise<boolean> {
    const row: Record<string, unknown> | undefined = await db(table).where(column, value).first(column);
    return row !== undefined;
  }
}

export const referenceService = new ReferenceService();
