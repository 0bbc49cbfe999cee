/**
 * Unit tests for find-query execution
 */

import { describe, it, expect } from 'vitest';
import { executeFindQuery } from '../../../src/lib/executor/index.js';
import { ExecutionError } from '../../../src/utils/errors.js';
import { InMemoryCollection } from '../../helpers/in-memory-source.js';

const people = () =>
  new InMemoryCollection('people', [
    { _id: 1, name: 'Ada', age: 36 },
    { _id: 2, name: 'Bob', age: 41 },
    { _id: 3, name: 'Cy', age: 36 },
  ]);

describe('executeFindQuery', () => {
  it('should return matching documents and their count', async () => {
    const result = await executeFindQuery(people(), { filter: { age: 36 } });
    expect(result).toEqual({
      documents: [
        { _id: 1, name: 'Ada', age: 36 },
        { _id: 3, name: 'Cy', age: 36 },
      ],
      count: 2,
    });
  });

  it('should pass only the options that were given', async () => {
    const collection = people();
    await executeFindQuery(collection, { filter: {} });
    expect(collection.calls).toEqual([{ method: 'find', args: [{}, {}] }]);
  });

  it('should translate sort, projection, skip and limit into driver options', async () => {
    const collection = people();
    const result = await executeFindQuery(collection, {
      filter: {},
      projection: { name: 1 },
      sort: [
        { field: 'age', direction: -1 },
        { field: 'name', direction: 1 },
      ],
      skip: 1,
      limit: 1,
    });

    expect(collection.calls[0]?.args[1]).toEqual({
      projection: { name: 1 },
      sort: { age: -1, name: 1 },
      limit: 1,
      skip: 1,
    });
    expect(result.documents).toEqual([{ _id: 1, name: 'Ada' }]);
  });

  it('should reject a filter that is not a document', async () => {
    await expect(executeFindQuery(people(), { filter: [1] })).rejects.toThrow(
      'Query filter must be a document.',
    );
  });

  it('should reject negative or fractional limits and skips', async () => {
    await expect(executeFindQuery(people(), { filter: {}, limit: -1 })).rejects.toThrow(
      'Limit must be a non-negative integer.',
    );
    await expect(executeFindQuery(people(), { filter: {}, skip: 1.5 })).rejects.toThrow(
      'Skip must be a non-negative integer.',
    );
  });

  it('should wrap driver failures', async () => {
    const broken = new InMemoryCollection('people', [], new Error('not authorized'));
    const attempt = executeFindQuery(broken, { filter: {} });
    await expect(attempt).rejects.toBeInstanceOf(ExecutionError);
    await expect(attempt).rejects.toThrow("Query execution failed on 'people': not authorized");
  });
});
