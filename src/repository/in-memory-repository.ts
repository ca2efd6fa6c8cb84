import type { Logger } from 'pino';
import type { EntityType } from '../entity/schema.js';
import { ArgumentError, EntityNotFoundError, NonUniqueResultError, RepositoryError } from '../errors.js';
import { bindPredicate, parseProjection } from '../expression/dynamic.js';
import { anyWhere, countWhere, runQuery } from '../query/pipeline.js';
import { Query, toSyntax, type PredicateSource } from '../query/query-object.js';
import type { Page, Repository } from '../types.js';

export interface InMemoryRepositoryConfig<T extends object> {
  entity: EntityType<T>;
  /** Initial contents; keys must be unique. */
  items?: Iterable<T>;
  /** Queries are logged at debug level with their predicate text. */
  logger?: Logger;
}

/**
 * Repository over a Map, running queries through the in-memory pipeline.
 * Stored entities are deep-copied on the way in and out, so arrays and dates
 * are never shared with callers. Generated keys count up from the largest
 * numeric key seen.
 */
export class InMemoryRepository<T extends object> implements Repository<T> {
  readonly entity: EntityType<T>;
  private readonly logger: Logger | undefined;
  private readonly items = new Map<unknown, T>();
  private lastKey = 0;

  constructor(config: InMemoryRepositoryConfig<T>) {
    this.entity = config.entity;
    this.logger = config.logger;
    for (const item of config.items ?? []) this.store(item);
  }

  private store(item: T): T {
    const copy = structuredClone(item);
    const key = this.entity.keyOf(copy);
    if (typeof key === 'number' && key > this.lastKey) this.lastKey = key;
    this.items.set(key, copy);
    return structuredClone(copy);
  }

  private snapshot(): T[] {
    return [...this.items.values()];
  }

  private predicateNode(predicate: PredicateSource<T> | undefined, values: readonly unknown[]) {
    return predicate === undefined ? null : toSyntax(predicate, values);
  }

  async create(entity: T): Promise<T> {
    const copy = structuredClone(entity);
    if (this.entity.generatedKey) {
      Reflect.set(copy, this.entity.key, this.lastKey + 1);
    } else if (this.items.has(this.entity.keyOf(copy))) {
      throw new RepositoryError(`${this.entity.name} with key ${String(this.entity.keyOf(copy))} already exists`);
    }
    return this.store(copy);
  }

  async update(entity: T): Promise<T> {
    const key = this.entity.keyOf(entity);
    if (!this.items.has(key)) throw new EntityNotFoundError(this.entity.name, key);
    return this.store(entity);
  }

  async delete(entity: T): Promise<void> {
    const key = this.entity.keyOf(entity);
    if (!this.items.delete(key)) throw new EntityNotFoundError(this.entity.name, key);
  }

  async deleteWhere(predicate: PredicateSource<T>, ...values: unknown[]): Promise<number> {
    const node = this.predicateNode(predicate, values);
    if (node === null) {
      throw new ArgumentError('predicate', 'deleteWhere requires a non-empty predicate');
    }
    const { test } = bindPredicate(this.entity, node);
    // Match everything before removing anything: a predicate that throws leaves the store intact.
    const keys = [...this.items].filter(([, item]) => test(item)).map(([key]) => key);
    for (const key of keys) this.items.delete(key);
    return keys.length;
  }

  async findOne(predicate: PredicateSource<T>, ...values: unknown[]): Promise<T | null> {
    const node = this.predicateNode(predicate, values);
    const test = node === null ? () => true : bindPredicate(this.entity, node).test;
    const matches = this.snapshot().filter((item) => test(item));
    if (matches.length > 1) throw new NonUniqueResultError(this.entity.name);
    const [match] = matches;
    return match === undefined ? null : structuredClone(match);
  }

  async findAll(query: Query<T> = Query.create<T>()): Promise<T[]> {
    this.logger?.debug({ entity: this.entity.name, orderings: query.orderings.length, limit: query.limit }, 'query');
    return runQuery(this.entity, this.snapshot(), query).map((item) => structuredClone(item));
  }

  async findPage(query: Query<T>, pageIndex: number, pageSize: number): Promise<Page<T>> {
    const items = await this.findAll(query.page(pageIndex, pageSize));
    const totalCount = countWhere(this.entity, this.snapshot(), query.predicate);
    return { items, totalCount, pageIndex, pageSize };
  }

  async count(predicate?: PredicateSource<T>, ...values: unknown[]): Promise<number> {
    return countWhere(this.entity, this.snapshot(), this.predicateNode(predicate, values));
  }

  async exists(predicate: PredicateSource<T>, ...values: unknown[]): Promise<boolean> {
    return anyWhere(this.entity, this.snapshot(), this.predicateNode(predicate, values));
  }

  async select(query: Query<T>, selector: string, ...values: unknown[]): Promise<unknown[]> {
    const projection = parseProjection(this.entity, selector, ...values);
    return runQuery(this.entity, this.snapshot(), query).map((item) => projection.project(structuredClone(item)));
  }
}
