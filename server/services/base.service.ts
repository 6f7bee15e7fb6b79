import { Knex } from 'knex';
import { getDb } from '../database/connection';
import type { CountRow } from '../database/rows';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../../shared/constants';
import type { Paginated } from '../../shared/types';
import { parseNum } from './posting-calculations';

export interface ListOptions {
  page?: number;
  limit?: number;
}

export interface PageQuery<TRow, TOut> extends ListOptions {
  columns: Array<string | Knex.Raw>;
  countColumn: string;
  orderBy: Array<{ column: string; order: 'asc' | 'desc' }>;
  map: (row: TRow) => TOut;
}

export class BaseService {
  protected tableName: string;

  constructor(tableName: string) {
    this.tableName = tableName;
  }

  protected get db(): Knex {
    return getDb();
  }

  /**
   * Runs a filtered query twice: once for the total, once for the page.
   * The query must not have a select yet; columns are applied here.
   */
  protected async paginate<TRow, TOut>(
    query: Knex.QueryBuilder,
    options: PageQuery<TRow, TOut>
  ): Promise<Paginated<TOut>> {
    const page = Math.max(1, Math.floor(options.page ?? 1));
    const limit = Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(options.limit ?? DEFAULT_PAGE_SIZE)));
    const offset = (page - 1) * limit;

    const countResult: CountRow | undefined = await query
      .clone()
      .count(`${options.countColumn} as total`)
      .first();
    const total = parseNum(countResult?.total ?? 0);

    let pageQuery = query.clone().select(options.columns);
    for (const { column, order } of options.orderBy) {
      pageQuery = pageQuery.orderBy(column, order);
    }
    const rows: TRow[] = await pageQuery.limit(limit).offset(offset);

    return {
      data: rows.map(options.map),
      total,
      page,
      limit,
      totalPages: Math.ceil(total / limit),
    };
  }
}
