export {
  ParseError,
  LexError,
  IncompatibleOperandsError,
  AmbiguousOperatorError,
  UnknownMemberError,
  ArgumentError,
  RepositoryError,
  EntityNotFoundError,
  NonUniqueResultError,
  UnsupportedExpressionError,
  formatParseError,
} from './errors.js';

export {
  parseExpression,
  parsePredicate,
  parseOrdering,
  parseProjection,
  bindPredicate,
  bindOrderings,
  compileRecordType,
} from './expression/dynamic.js';
export type {
  ParseOptions,
  CompiledExpression,
  CompiledPredicate,
  CompiledOrdering,
  CompiledProjection,
} from './expression/dynamic.js';
export { DynamicRecord, RecordType } from './expression/record-types.js';
export type { DynamicProperty } from './expression/record-types.js';
export { parseTypeName, typeName } from './expression/type-system.js';
export type { TypeRef, PrimitiveName } from './expression/type-system.js';

export { defineEntity, EntityType, toSnakeCase } from './entity/schema.js';
export type { EntityDefinition, FieldDefinition, FieldType, EntityField } from './entity/schema.js';
export { mapRow, toColumnValues } from './entity/row-mapper.js';
export type { Row } from './entity/row-mapper.js';

export { Predicate, FieldRef, field, predicate } from './query/predicate.js';
export { FilterExpression } from './query/filter-expression.js';
export { Query, query } from './query/query-object.js';
export type { PredicateSource, OrderingSource, Paging } from './query/query-object.js';
export { runQuery, filterAndOrder, countWhere, anyWhere } from './query/pipeline.js';
export {
  compileSelectQuery,
  compileCountQuery,
  compileExistsQuery,
  compileDeleteQuery,
  compileInsertQuery,
  compileUpdateQuery,
  compileDeleteByKeyQuery,
} from './query/compiler.js';
export type { CompiledQuery, SelectOptions } from './query/compiler.js';

export { PostgresRepository } from './repository/postgres-repository.js';
export type { PostgresRepositoryConfig } from './repository/postgres-repository.js';
export { InMemoryRepository } from './repository/in-memory-repository.js';
export type { InMemoryRepositoryConfig } from './repository/in-memory-repository.js';
export type { Page, Repository } from './types.js';
