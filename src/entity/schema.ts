import { ArgumentError } from '../errors.js';
import {
  entityType,
  parseTypeName,
  sequenceOf,
  typeName,
  zeroValue,
  type TypeRef,
} from '../expression/type-system.js';

/**
 * Field declaration: a type name such as `'int'`, `'string?'` or
 * `'DateTime'`, or a nested entity for a sequence of child records.
 */
export type FieldType = string | EntityType;

export interface FieldDefinition {
  readonly type: FieldType;
  /** Column name; defaults to the snake_case form of the property. */
  readonly column?: string;
}

export interface EntityDefinition<T extends object> {
  readonly name: string;
  readonly table: string;
  readonly key: keyof T & string;
  /** True when the store assigns the key (serial/identity column). */
  readonly generatedKey?: boolean;
  readonly fields: { readonly [K in keyof T & string]?: FieldType | FieldDefinition };
}

export interface EntityField {
  readonly property: string;
  readonly column: string;
  readonly type: TypeRef;
}

export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}

function resolveFieldType(property: string, type: FieldType): TypeRef {
  if (type instanceof EntityType) return sequenceOf(entityType(type));
  try {
    return parseTypeName(type);
  } catch (err) {
    if (err instanceof ArgumentError) {
      throw new ArgumentError('fields', `Field '${property}': ${err.message}`);
    }
    throw err;
  }
}

/**
 * Runtime description of a persisted record type: its table, key and typed
 * fields. Expression binding, row mapping and SQL generation all read it.
 */
export class EntityType<T extends object = object> {
  readonly fields: readonly EntityField[];
  private readonly byName: ReadonlyMap<string, EntityField>;

  constructor(
    readonly name: string,
    readonly table: string,
    readonly key: string,
    readonly generatedKey: boolean,
    fields: readonly EntityField[],
  ) {
    this.fields = fields;
    this.byName = new Map(fields.map((f) => [f.property.toLowerCase(), f]));
  }

  /** Case-insensitive field lookup. */
  field(name: string): EntityField | undefined {
    return this.byName.get(name.toLowerCase());
  }

  get keyField(): EntityField {
    const field = this.field(this.key);
    if (field === undefined) {
      throw new ArgumentError('key', `Key '${this.key}' is not a field of '${this.name}'`);
    }
    return field;
  }

  /** Persisted fields; sequence-typed fields have no column. */
  get columns(): readonly EntityField[] {
    return this.fields.filter((f) => f.type.kind !== 'sequence' || f.type.element.kind === 'primitive');
  }

  read(entity: T, property: string): unknown {
    return Reflect.get(entity, property) ?? null;
  }

  keyOf(entity: T): unknown {
    return this.read(entity, this.key);
  }

  /** Builds an entity from property values; absent fields take their zero value. */
  materialize(values: Readonly<Record<string, unknown>>): T {
    const entity: Record<string, unknown> = {};
    for (const f of this.fields) {
      const value = values[f.property];
      entity[f.property] = value === undefined ? zeroValue(f.type) : value;
    }
    // Every declared field is set above; T's shape is the field list.
    return entity as T;
  }

  toString(): string {
    const fields = this.fields.map((f) => `${f.property}: ${typeName(f.type)}`);
    return `${this.name}(${fields.join(', ')})`;
  }
}

/**
 * Declares an entity type.
 *
 * @example
 * const conferenceEntity = defineEntity<Conference>({
 *   name: 'Conference',
 *   table: 'conference',
 *   key: 'conferenceId',
 *   generatedKey: true,
 *   fields: { conferenceId: 'int', name: 'string', status: 'int', startDate: 'DateTime?' },
 * });
 */
export function defineEntity<T extends object>(definition: EntityDefinition<T>): EntityType<T> {
  const { name, table, key } = definition;
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ArgumentError('name', 'Entity name must be a non-empty string');
  }
  if (typeof table !== 'string' || table.trim() === '') {
    throw new ArgumentError('table', 'Entity table must be a non-empty string');
  }

  const fields: EntityField[] = [];
  for (const [property, declaration] of Object.entries<FieldType | FieldDefinition | undefined>(definition.fields)) {
    if (declaration === undefined) continue;
    const def: FieldDefinition =
      typeof declaration === 'string' || declaration instanceof EntityType ? { type: declaration } : declaration;
    fields.push({
      property,
      column: def.column ?? toSnakeCase(property),
      type: resolveFieldType(property, def.type),
    });
  }
  if (fields.length === 0) {
    throw new ArgumentError('fields', `Entity '${name}' declares no fields`);
  }

  const seen = new Set<string>();
  for (const f of fields) {
    const lower = f.property.toLowerCase();
    if (seen.has(lower)) {
      throw new ArgumentError('fields', `Field '${f.property}' is declared more than once`);
    }
    seen.add(lower);
  }

  if (!fields.some((f) => f.property === key)) {
    throw new ArgumentError('key', `Key '${String(key)}' is not a field of '${name}'`);
  }

  return new EntityType<T>(name, table, key, definition.generatedKey ?? false, fields);
}
