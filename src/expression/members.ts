import type { Overload } from './resolver.js';
import {
  BOOL,
  INT,
  STRING,
  isPrimitive,
  nonNullable,
  primitive,
  type PrimitiveName,
  type TypeRef,
} from './type-system.js';

/** SQL template: receives the already-compiled target and argument fragments. */
export type SqlTemplate = (target: string, args: readonly string[]) => string;

export interface BoundProperty {
  readonly name: string;
  readonly type: TypeRef;
  evaluate(target: unknown): unknown;
  readonly sql?: SqlTemplate;
}

export interface BoundMethod extends Overload {
  readonly name: string;
  readonly result: TypeRef;
  evaluate(target: unknown, args: readonly unknown[]): unknown;
  readonly sql?: SqlTemplate;
}

const DAY_MS = 86_400_000;
const HOUR_MS = 3_600_000;
const MINUTE_MS = 60_000;
const SECOND_MS = 1_000;

const DOUBLE = primitive('double');
const DATETIME = primitive('DateTime');

function asString(value: unknown): string {
  return typeof value === 'string' ? value : String(value);
}

function asNumber(value: unknown): number {
  return typeof value === 'number' ? value : Number(value);
}

function asDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(asNumber(value));
}

// ============================================================
// PROPERTIES
// ============================================================

const STRING_PROPERTIES: readonly BoundProperty[] = [
  { name: 'Length', type: INT, evaluate: (t) => asString(t).length, sql: (t) => `char_length(${t})` },
];

function datePart(name: string, field: string, read: (d: Date) => number): BoundProperty {
  return {
    name,
    type: INT,
    evaluate: (t) => read(asDate(t)),
    sql: (t) => `CAST(EXTRACT(${field} FROM ${t}) AS integer)`,
  };
}

// DateTime parts are read in UTC.
const DATETIME_PROPERTIES: readonly BoundProperty[] = [
  datePart('Year', 'YEAR', (d) => d.getUTCFullYear()),
  datePart('Month', 'MONTH', (d) => d.getUTCMonth() + 1),
  datePart('Day', 'DAY', (d) => d.getUTCDate()),
  datePart('Hour', 'HOUR', (d) => d.getUTCHours()),
  datePart('Minute', 'MINUTE', (d) => d.getUTCMinutes()),
  {
    name: 'Second',
    type: INT,
    evaluate: (t) => asDate(t).getUTCSeconds(),
    sql: (t) => `CAST(floor(EXTRACT(SECOND FROM ${t})) AS integer)`,
  },
  {
    name: 'Millisecond',
    type: INT,
    evaluate: (t) => asDate(t).getUTCMilliseconds(),
    sql: (t) => `(CAST(floor(EXTRACT(MILLISECONDS FROM ${t})) AS integer) % 1000)`,
  },
  datePart('DayOfWeek', 'DOW', (d) => d.getUTCDay()),
  {
    name: 'Date',
    type: DATETIME,
    evaluate: (t) => {
      const d = asDate(t);
      return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
    },
    sql: (t) => `date_trunc('day', ${t})`,
  },
];

function total(name: string, unit: number): BoundProperty {
  return {
    name,
    type: DOUBLE,
    evaluate: (t) => asNumber(t) / unit,
    sql: (t) => `(${t} / ${unit}.0)`,
  };
}

function component(name: string, unit: number, modulo: number | null): BoundProperty {
  return {
    name,
    type: INT,
    evaluate: (t) => {
      const whole = Math.trunc(asNumber(t) / unit);
      return modulo === null ? whole : whole % modulo;
    },
    sql: (t) => (modulo === null ? `(${t} / ${unit})` : `((${t} / ${unit}) % ${modulo})`),
  };
}

// TimeSpan values are milliseconds.
const TIMESPAN_PROPERTIES: readonly BoundProperty[] = [
  total('TotalMilliseconds', 1),
  total('TotalSeconds', SECOND_MS),
  total('TotalMinutes', MINUTE_MS),
  total('TotalHours', HOUR_MS),
  total('TotalDays', DAY_MS),
  component('Days', DAY_MS, null),
  component('Hours', HOUR_MS, 24),
  component('Minutes', MINUTE_MS, 60),
  component('Seconds', SECOND_MS, 60),
];

function nullableProperties(t: TypeRef): readonly BoundProperty[] {
  return [
    { name: 'HasValue', type: BOOL, evaluate: (v) => v !== null && v !== undefined, sql: (v) => `(${v} IS NOT NULL)` },
    { name: 'Value', type: nonNullable(t), evaluate: (v) => v, sql: (v) => v },
  ];
}

function sequenceProperties(): readonly BoundProperty[] {
  const length = (v: unknown): number => (Array.isArray(v) ? v.length : 0);
  return [
    { name: 'Length', type: INT, evaluate: length, sql: (v) => `cardinality(${v})` },
    { name: 'Count', type: INT, evaluate: length, sql: (v) => `cardinality(${v})` },
  ];
}

function findByName<M extends { readonly name: string }>(members: readonly M[], name: string): M | undefined {
  const lower = name.toLowerCase();
  return members.find((m) => m.name.toLowerCase() === lower);
}

/** Instance property of a primitive or sequence type, matched case-insensitively. */
export function findProperty(target: TypeRef, name: string): BoundProperty | undefined {
  if (target.kind === 'sequence') return findByName(sequenceProperties(), name);
  if (target.kind !== 'primitive') return undefined;
  if (target.nullable) {
    const own = findByName(nullableProperties(target), name);
    if (own !== undefined) return own;
  }
  switch (target.name) {
    case 'string':
      return findByName(STRING_PROPERTIES, name);
    case 'DateTime':
      return findByName(DATETIME_PROPERTIES, name);
    case 'TimeSpan':
      return findByName(TIMESPAN_PROPERTIES, name);
    default:
      return undefined;
  }
}

const STATIC_PROPERTIES: Readonly<Record<string, readonly BoundProperty[]>> = {
  DateTime: [
    { name: 'Now', type: DATETIME, evaluate: () => new Date(), sql: () => 'now()' },
    {
      name: 'Today',
      type: DATETIME,
      evaluate: () => {
        const now = new Date();
        return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
      },
      sql: () => `date_trunc('day', now())`,
    },
  ],
};

export function findStaticProperty(typeName: string, name: string): BoundProperty | undefined {
  const members = STATIC_PROPERTIES[typeName];
  return members === undefined ? undefined : findByName(members, name);
}

// ============================================================
// METHODS
// ============================================================

function method(
  name: string,
  params: readonly TypeRef[],
  result: TypeRef,
  evaluate: BoundMethod['evaluate'],
  sql?: SqlTemplate,
): BoundMethod {
  return { name, params, result, evaluate, ...(sql === undefined ? {} : { sql }) };
}

function arg(args: readonly unknown[], i: number): unknown {
  return args[i];
}

const STRING_METHODS: readonly BoundMethod[] = [
  method('Contains', [STRING], BOOL, (t, a) => asString(t).includes(asString(arg(a, 0))), (t, [x = '']) => `(strpos(${t}, ${x}) > 0)`),
  method('StartsWith', [STRING], BOOL, (t, a) => asString(t).startsWith(asString(arg(a, 0))), (t, [x = '']) => `starts_with(${t}, ${x})`),
  method('EndsWith', [STRING], BOOL, (t, a) => asString(t).endsWith(asString(arg(a, 0))), (t, [x = '']) => `(right(${t}, char_length(${x})) = ${x})`),
  method('ToUpper', [], STRING, (t) => asString(t).toUpperCase(), (t) => `upper(${t})`),
  method('ToLower', [], STRING, (t) => asString(t).toLowerCase(), (t) => `lower(${t})`),
  method('Trim', [], STRING, (t) => asString(t).trim(), (t) => `btrim(${t})`),
  method('IndexOf', [STRING], INT, (t, a) => asString(t).indexOf(asString(arg(a, 0))), (t, [x = '']) => `(strpos(${t}, ${x}) - 1)`),
  method(
    'Substring',
    [INT],
    STRING,
    (t, a) => substring(asString(t), asNumber(arg(a, 0))),
    (t, [start = '']) => `substr(${t}, ${start} + 1)`,
  ),
  method(
    'Substring',
    [INT, INT],
    STRING,
    (t, a) => substring(asString(t), asNumber(arg(a, 0)), asNumber(arg(a, 1))),
    (t, [start = '', length = '']) => `substr(${t}, ${start} + 1, ${length})`,
  ),
  method(
    'Replace',
    [STRING, STRING],
    STRING,
    (t, a) => asString(t).split(asString(arg(a, 0))).join(asString(arg(a, 1))),
    (t, [from = '', to = '']) => `replace(${t}, ${from}, ${to})`,
  ),
];

function substring(s: string, start: number, length?: number): string {
  const end = length === undefined ? s.length : start + length;
  if (start < 0 || start > s.length || end < start || end > s.length) {
    throw new RangeError('Index and length must refer to a location within the string.');
  }
  return s.slice(start, end);
}

export function findMethods(target: TypeRef, name: string): readonly BoundMethod[] {
  if (!isPrimitive(target, 'string')) return [];
  const lower = name.toLowerCase();
  return STRING_METHODS.filter((m) => m.name.toLowerCase() === lower);
}

// Midpoint values round away from zero, in memory and in SQL.
function roundAway(value: number, digits = 0): number {
  const factor = 10 ** digits;
  const scaled = Math.abs(value) * factor;
  return (Math.sign(value) * Math.round(scaled)) / factor;
}

const MATH_NUMERIC: readonly PrimitiveName[] = ['int', 'long', 'float', 'double', 'decimal'];
const MATH_REAL: readonly PrimitiveName[] = ['double', 'decimal'];

function overEach(
  names: readonly PrimitiveName[],
  build: (t: TypeRef) => BoundMethod[],
): BoundMethod[] {
  return names.flatMap((name) => build(primitive(name)));
}

const MATH_METHODS: readonly BoundMethod[] = [
  ...overEach(MATH_NUMERIC, (t) => [
    method('Abs', [t], t, (_, [x]) => Math.abs(asNumber(x)), (_, [x = '']) => `abs(${x})`),
    method('Min', [t, t], t, (_, [x, y]) => Math.min(asNumber(x), asNumber(y)), (_, [x = '', y = '']) => `LEAST(${x}, ${y})`),
    method('Max', [t, t], t, (_, [x, y]) => Math.max(asNumber(x), asNumber(y)), (_, [x = '', y = '']) => `GREATEST(${x}, ${y})`),
  ]),
  ...overEach(MATH_REAL, (t) => [
    method('Round', [t], t, (_, [x]) => roundAway(asNumber(x)), (_, [x = '']) => `round(CAST(${x} AS numeric))`),
    method(
      'Round',
      [t, INT],
      t,
      (_, [x, digits]) => roundAway(asNumber(x), asNumber(digits)),
      (_, [x = '', digits = '']) => `round(CAST(${x} AS numeric), ${digits})`,
    ),
    method('Floor', [t], t, (_, [x]) => Math.floor(asNumber(x)), (_, [x = '']) => `floor(${x})`),
    method('Ceiling', [t], t, (_, [x]) => Math.ceil(asNumber(x)), (_, [x = '']) => `ceil(${x})`),
  ]),
];

const DATETIME_CONSTRUCTORS: readonly BoundMethod[] = [
  method(
    'DateTime',
    [INT, INT, INT],
    DATETIME,
    (_, [y, m, d]) => utcDate(asNumber(y), asNumber(m), asNumber(d), 0, 0, 0),
    (_, [y = '', m = '', d = '']) => `make_timestamptz(${y}, ${m}, ${d}, 0, 0, 0, 'UTC')`,
  ),
  method(
    'DateTime',
    [INT, INT, INT, INT, INT, INT],
    DATETIME,
    (_, [y, m, d, h, mi, s]) =>
      utcDate(asNumber(y), asNumber(m), asNumber(d), asNumber(h), asNumber(mi), asNumber(s)),
    (_, [y = '', m = '', d = '', h = '', mi = '', s = '']) =>
      `make_timestamptz(${y}, ${m}, ${d}, ${h}, ${mi}, ${s}, 'UTC')`,
  ),
];

function utcDate(year: number, month: number, day: number, hour: number, minute: number, second: number): Date {
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC maps years 0-99 to 1900-1999.
  date.setUTCFullYear(year);
  if (
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new RangeError('Year, Month, and Day parameters describe an un-representable DateTime.');
  }
  return date;
}

export function findStaticMethods(typeName: string, name: string): readonly BoundMethod[] {
  if (typeName !== 'Math') return [];
  const lower = name.toLowerCase();
  return MATH_METHODS.filter((m) => m.name.toLowerCase() === lower);
}

export function findConstructors(typeName: string): readonly BoundMethod[] {
  return typeName === 'DateTime' ? DATETIME_CONSTRUCTORS : [];
}
