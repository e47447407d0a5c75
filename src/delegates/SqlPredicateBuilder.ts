// src/delegates/SqlPredicateBuilder.ts

export type SqlParam = string | number | null;

/**
 * Composes `AND`-joined predicates with positional parameters.
 * Optional bounds are added only when a value is present.
 */
export class SqlPredicateBuilder {
  private readonly clauses: string[] = [];
  private readonly params: SqlParam[] = [];

  where(clause: string, ...params: SqlParam[]): this {
    this.clauses.push(clause);
    this.params.push(...params);
    return this;
  }

  whereIf<T extends SqlParam>(value: T | undefined, clause: string): this {
    if (value === undefined || value === null) return this;
    return this.where(clause, value);
  }

  build(): { sql: string; params: SqlParam[] } {
    const sql = this.clauses.length ? `WHERE ${this.clauses.join(' AND ')}` : '';
    return { sql, params: [...this.params] };
  }
}
