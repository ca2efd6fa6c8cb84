import pg from 'pg';
import type { Logger } from 'pino';
import type { EntityType } from '../entity/schema.js';
import { mapRow, type Row } from '../entity/row-mapper.js';
import { ArgumentError, EntityNotFoundError, NonUniqueResultError, RepositoryError } from '../errors.js';
import { bindExpression, bindOrdering } from '../expression/binder.js';
import { parseProjection } from '../expression/dynamic.js';
import type { Expr } from '../expression/expr.js';
import type { SyntaxNode } from '../expression/syntax.js';
import { BOOL, entityType } from '../expression/type-system.js';
import {
  compileCountQuery,
  compileDeleteByKeyQuery,
  compileDeleteQuery,
  compileExistsQuery,
  compileInsertQuery,
  compileSelectQuery,
  compileUpdateQuery,
  type CompiledQuery,
} from '../query/compiler.js';
import { Query, toSyntax, type PredicateSource } from '../query/query-object.js';
import type { Page, Repository } from '../types.js';

export interface PostgresRepositoryConfig<T extends object> {
  pool: pg.Pool;
  entity: EntityType<T>;
  /** Statements are logged at debug level with their parameters. */
  logger?: Logger;
}

/**
 * Repository backed by one PostgreSQL table. Predicates and orderings are
 * bound against the entity schema and compiled to parameterised SQL; pg
 * errors propagate unchanged.
 */
export class PostgresRepository<T extends object> implements Repository<T> {
  protected readonly pool: pg.Pool;
  readonly entity: EntityType<T>;
  private readonly logger: Logger | undefined;

  constructor(config: PostgresRepositoryConfig<T>) {
    this.pool = config.pool;
    this.entity = config.entity;
    this.logger = config.logger;
  }

  private async execute(query: CompiledQuery): Promise<pg.QueryResult<Row>> {
    this.logger?.debug({ sql: query.sql, params: query.params }, 'query');
    return this.pool.query<Row>(query.sql, query.params);
  }

  private bindWhere(node: SyntaxNode | null): Expr | null {
    return node === null ? null : bindExpression(node, entityType(this.entity), BOOL);
  }

  private where(predicate: PredicateSource<T> | undefined, values: readonly unknown[]): Expr | null {
    return predicate === undefined ? null : this.bindWhere(toSyntax(predicate, values));
  }

  private firstRow(result: pg.QueryResult<Row>): Row {
    const [row] = result.rows;
    if (row === undefined) {
      throw new RepositoryError(`${this.entity.name} statement returned no row`);
    }
    return row;
  }

  async create(entity: T): Promise<T> {
    const result = await this.execute(compileInsertQuery(this.entity, entity));
    return mapRow(this.entity, this.firstRow(result));
  }

  async update(entity: T): Promise<T> {
    const result = await this.execute(compileUpdateQuery(this.entity, entity));
    const [row] = result.rows;
    if (row === undefined) {
      throw new EntityNotFoundError(this.entity.name, this.entity.keyOf(entity));
    }
    return mapRow(this.entity, row);
  }

  async delete(entity: T): Promise<void> {
    const key = this.entity.keyOf(entity);
    const result = await this.execute(compileDeleteByKeyQuery(this.entity, key));
    if (result.rowCount === 0) {
      throw new EntityNotFoundError(this.entity.name, key);
    }
  }

  async deleteWhere(predicate: PredicateSource<T>, ...values: unknown[]): Promise<number> {
    const where = this.where(predicate, values);
    if (where === null) {
      throw new ArgumentError('predicate', 'deleteWhere requires a non-empty predicate');
    }
    const result = await this.execute(compileDeleteQuery(this.entity, where));
    return result.rowCount ?? 0;
  }

  async findOne(predicate: PredicateSource<T>, ...values: unknown[]): Promise<T | null> {
    // Two rows are enough to tell "one" from "several".
    const query = compileSelectQuery(this.entity, { where: this.where(predicate, values), limit: 2 });
    const result = await this.execute(query);
    if (result.rows.length > 1) throw new NonUniqueResultError(this.entity.name);
    const [row] = result.rows;
    return row === undefined ? null : mapRow(this.entity, row);
  }

  async findAll(query: Query<T> = Query.create<T>()): Promise<T[]> {
    const paging = query.paging;
    const compiled = compileSelectQuery(this.entity, {
      where: this.bindWhere(query.predicate),
      orderings: bindOrdering(query.orderings, entityType(this.entity)),
      limit: paging === null ? query.limit : paging.pageSize,
      offset: paging === null ? null : (paging.pageIndex - 1) * paging.pageSize,
    });
    const result = await this.execute(compiled);
    return result.rows.map((row) => mapRow(this.entity, row));
  }

  async findPage(query: Query<T>, pageIndex: number, pageSize: number): Promise<Page<T>> {
    const paged = query.page(pageIndex, pageSize);
    const items = await this.findAll(paged);
    const totalCount = await this.countWhere(this.bindWhere(query.predicate));
    return { items, totalCount, pageIndex, pageSize };
  }

  async count(predicate?: PredicateSource<T>, ...values: unknown[]): Promise<number> {
    return this.countWhere(this.where(predicate, values));
  }

  private async countWhere(where: Expr | null): Promise<number> {
    const result = await this.execute(compileCountQuery(this.entity, where));
    return Number(this.firstRow(result)['count']);
  }

  async exists(predicate: PredicateSource<T>, ...values: unknown[]): Promise<boolean> {
    const result = await this.execute(compileExistsQuery(this.entity, this.where(predicate, values)));
    return this.firstRow(result)['exists'] === true;
  }

  async select(query: Query<T>, selector: string, ...values: unknown[]): Promise<unknown[]> {
    const projection = parseProjection(this.entity, selector, ...values);
    const items = await this.findAll(query);
    return items.map((item) => projection.project(item));
  }

  /** Runs a raw SELECT and maps each row to an entity. */
  async sqlQuery(sql: string, params: unknown[] = []): Promise<T[]> {
    const result = await this.execute({ sql, params });
    return result.rows.map((row) => mapRow(this.entity, row));
  }
}
