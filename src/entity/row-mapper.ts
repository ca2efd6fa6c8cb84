import type { TypeRef } from '../expression/type-system.js';
import { isNumeric, isPrimitive } from '../expression/type-system.js';
import type { EntityField, EntityType } from './schema.js';

/** A row as returned by pg: column name → driver value. */
export type Row = Readonly<Record<string, unknown>>;

export interface ColumnValue {
  readonly column: string;
  readonly value: unknown;
}

// pg returns int8 and numeric as strings, timestamps as Date.
function fromDriver(value: unknown, type: TypeRef): unknown {
  if (value === null || value === undefined) return null;
  if (type.kind === 'sequence') {
    return Array.isArray(value) ? value.map((item) => fromDriver(item, type.element)) : value;
  }
  if ((isNumeric(type) || isPrimitive(type, 'TimeSpan')) && typeof value === 'string') {
    return Number(value);
  }
  if (isPrimitive(type, 'DateTime') && !(value instanceof Date)) {
    return new Date(typeof value === 'number' ? value : String(value));
  }
  return value;
}

/** Converts a pg row into an entity; columns missing from the row take their zero value. */
export function mapRow<T extends object>(entity: EntityType<T>, row: Row): T {
  const values: Record<string, unknown> = {};
  for (const field of entity.columns) {
    if (field.column in row) {
      values[field.property] = fromDriver(row[field.column], field.type);
    }
  }
  return entity.materialize(values);
}

/**
 * Column/value pairs for an insert or update, in declaration order. The key
 * column is left out when `includeKey` is false.
 */
export function toColumnValues<T extends object>(
  entity: EntityType<T>,
  value: T,
  includeKey = true,
): ColumnValue[] {
  return entity.columns
    .filter((field: EntityField) => includeKey || field.property !== entity.key)
    .map((field) => ({ column: field.column, value: entity.read(value, field.property) }));
}
