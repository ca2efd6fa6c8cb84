import { describe, it, expect } from 'vitest';
import { DynamicRecord, compileRecordType } from '../../src/expression/record-types.js';
import { INT, STRING, primitive } from '../../src/expression/type-system.js';
import { ArgumentError } from '../../src/errors.js';

const NULLABLE_INT = primitive('int', true);

describe('compileRecordType', () => {
  it('returns one type per set of properties, in any order', () => {
    const a = compileRecordType([
      { name: 'Code', type: STRING },
      { name: 'Count', type: INT },
    ]);
    const b = compileRecordType([
      { name: 'Count', type: INT },
      { name: 'Code', type: STRING },
    ]);
    expect(b).toBe(a);
    expect(a.name).toMatch(/^DynamicClass\d+$/);
  });

  it('shares one type between concurrent first requests', async () => {
    const request = async () =>
      compileRecordType([
        { name: 'Speaker', type: STRING },
        { name: 'Sessions', type: INT },
      ]);
    const [a, b] = await Promise.all([request(), request()]);
    expect(b).toBe(a);
  });

  it('creates a new type when a property type differs', () => {
    const a = compileRecordType([{ name: 'Total', type: INT }]);
    const b = compileRecordType([{ name: 'Total', type: NULLABLE_INT }]);
    expect(b).not.toBe(a);
    expect(b.name).not.toBe(a.name);
  });

  it('rejects duplicate names regardless of case', () => {
    expect(() =>
      compileRecordType([
        { name: 'Id', type: INT },
        { name: 'ID', type: INT },
      ]),
    ).toThrow(ArgumentError);
  });
});

describe('DynamicRecord', () => {
  const pair = compileRecordType([
    { name: 'Label', type: STRING },
    { name: 'Size', type: NULLABLE_INT },
  ]);

  it('creates instances from positional or named values', () => {
    const positional = pair.create(['a', 1]);
    const named = pair.create({ size: 1, label: 'a' });
    expect(positional.get('Label')).toBe('a');
    expect(named.get('SIZE')).toBe(1);
    expect(positional.equals(named)).toBe(true);
    expect(positional.hashCode()).toBe(named.hashCode());
  });

  it('fills missing values with zero values', () => {
    const empty = pair.create();
    expect(empty.get('Label')).toBeNull();
    expect(empty.get('Size')).toBeNull();
  });

  it('is not equal to a record of another type', () => {
    const other = compileRecordType([{ name: 'Label', type: STRING }]);
    expect(pair.create(['a', null]).equals(other.create(['a']))).toBe(false);
  });

  it('renders as text and JSON', () => {
    const record = pair.create(['a', 2]);
    expect(record.toString()).toBe('{Label=a, Size=2}');
    expect(record.toJSON()).toEqual({ Label: 'a', Size: 2 });
    expect(JSON.stringify(record)).toBe('{"Label":"a","Size":2}');
  });

  it('rejects unknown property names', () => {
    expect(() => pair.create().get('Weight')).toThrow(/No property 'Weight' exists in type 'DynamicClass\d+'/);
  });

  it('is a DynamicRecord', () => {
    expect(pair.create()).toBeInstanceOf(DynamicRecord);
  });
});
