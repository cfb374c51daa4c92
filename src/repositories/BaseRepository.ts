/**
 * Shared plumbing for the Postgres repositories.
 *
 * A repository is bound to one QueryFn: the pool's autocommit query for plain
 * reads, or the query of the serializable transaction it was built inside.
 * Rows come back snake_case and are mapped through toEntity.
 */

import type { QueryFn } from '../db';

export abstract class BaseRepository<Row, T> {
  protected abstract readonly tableName: string;

  constructor(protected readonly query: QueryFn) {}

  protected abstract toEntity(row: Row): T;

  protected async one(sql: string, params: unknown[]): Promise<T | null> {
    const { rows } = await this.query<Row>(sql, params);
    return rows.length > 0 ? this.toEntity(rows[0]) : null;
  }

  protected async many(sql: string, params: unknown[]): Promise<T[]> {
    const { rows } = await this.query<Row>(sql, params);
    return rows.map(row => this.toEntity(row));
  }

  /** Single-row lookup on a key column; `lock` takes the row for the rest of the transaction. */
  protected byKey(column: string, value: string, lock = false): Promise<T | null> {
    return this.one(`SELECT * FROM ${this.tableName} WHERE ${column} = $1${lock ? ' FOR UPDATE' : ''}`, [value]);
  }

  protected async exists(where: string, params: unknown[]): Promise<boolean> {
    const { rows } = await this.query<{ exists: boolean }>(
      `SELECT EXISTS(SELECT 1 FROM ${this.tableName} WHERE ${where}) AS exists`,
      params
    );
    return rows[0]?.exists ?? false;
  }

  protected async countWhere(where: string, params: unknown[]): Promise<number> {
    const { rows } = await this.query<{ count: number }>(
      `SELECT COUNT(*)::int as count FROM ${this.tableName} WHERE ${where}`,
      params
    );
    return rows[0]?.count ?? 0;
  }

  /** Run a write and report how many rows it touched. */
  protected async execute(sql: string, params: unknown[]): Promise<number> {
    const { rowCount } = await this.query(sql, params);
    return rowCount;
  }
}
