import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the dynamic expression functions', async () => {
    const api = await import('../../src/index.js');
    expect(typeof api.parseExpression).toBe('function');
    expect(typeof api.parsePredicate).toBe('function');
    expect(typeof api.parseOrdering).toBe('function');
    expect(typeof api.parseProjection).toBe('function');
    expect(typeof api.compileRecordType).toBe('function');
  });

  it('exports the query DSL', async () => {
    const { query, field, predicate, FilterExpression } = await import('../../src/index.js');
    expect(typeof query().where).toBe('function');
    expect(typeof field<{ x: number }>('x').eq).toBe('function');
    expect(typeof predicate).toBe('function');
    expect(FilterExpression.empty().isEmpty).toBe(true);
  });

  it('exports both repositories', async () => {
    const { PostgresRepository, InMemoryRepository } = await import('../../src/index.js');
    expect(typeof PostgresRepository).toBe('function');
    expect(typeof InMemoryRepository).toBe('function');
  });

  it('exports ParseError as a class usable with instanceof', async () => {
    const { ParseError, parseExpression } = await import('../../src/index.js');
    let caught: unknown;
    try {
      parseExpression('1 +');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ParseError);
    expect(caught).toBeInstanceOf(Error);
  });

  it('evaluates an expression end to end', async () => {
    const { parseExpression } = await import('../../src/index.js');
    expect(parseExpression('"x" + 2 * 3').evaluate()).toBe('x6');
  });
});
