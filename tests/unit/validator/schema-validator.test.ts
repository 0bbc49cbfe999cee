/**
 * Unit tests for schema-aware query validation
 */

import { describe, it, expect } from 'vitest';
import { ObjectId } from 'mongodb';
import { inferCollectionSchema } from '../../../src/lib/inferencer/index.js';
import {
  QueryValidator,
  validateQueryAgainstSchema,
} from '../../../src/lib/validator/index.js';
import type { SchemaNode, TypeTag } from '../../../src/types/data-model.js';

const schema = inferCollectionSchema([
  {
    name: 'Ada',
    age: 36,
    nickname: null,
    tags: ['a', 'b'],
    address: { city: 'London', zip: 12345 },
    scores: [{ subject: 'math', score: 9.5 }],
    history: [],
  },
  {
    name: 'Bob',
    age: 41,
    nickname: 'bobby',
    tags: [],
    address: { city: 'Paris', zip: 75001 },
    scores: [{ subject: 'art', score: 7 }],
    history: [],
  },
]);

const check = (query: unknown, maxDepth?: number): string[] =>
  validateQueryAgainstSchema(query, schema, maxDepth === undefined ? {} : { maxDepth });

describe('validateQueryAgainstSchema', () => {
  describe('inputs', () => {
    it('should reject a query that is not a document', () => {
      expect(check([])).toEqual(['Query document must be a document.']);
    });

    it('should reject a schema that is not a field map', () => {
      expect(validateQueryAgainstSchema({}, { name: 'string' })).toEqual([
        'Expected schema must be a map of field names to schema nodes.',
      ]);
    });

    it('should accept an empty filter', () => {
      expect(check({})).toEqual([]);
    });
  });

  describe('implicit equality', () => {
    it('should accept values of observed types', () => {
      expect(check({ name: 'Ada', age: 36, nickname: 'x' })).toEqual([]);
    });

    it('should report type mismatches', () => {
      expect(check({ age: 'old' })).toEqual([
        "Type mismatch for field 'age': Query uses type 'string', but schema expects [int].",
      ]);
    });

    it('should let numeric types stand in for each other', () => {
      expect(check({ age: 36.5 })).toEqual([]);
    });

    it('should only accept null for fields observed as null', () => {
      expect(check({ nickname: null })).toEqual([]);
      expect(check({ name: null })).toEqual([
        "Type mismatch for field 'name': Query uses type 'null', but schema expects [string].",
      ]);
    });

    it('should accept an embedded document match on an object field', () => {
      expect(check({ address: { city: 'Oslo', zip: 150 } })).toEqual([]);
    });

    it('should report a document compared to a scalar field', () => {
      expect(check({ name: { first: 'Ada' } })).toEqual([
        "Type mismatch for field 'name': Query uses type 'object', but schema expects [string].",
      ]);
    });
  });

  describe('field paths', () => {
    it('should report unknown top-level fields', () => {
      expect(check({ email: 'a@example.com' })).toEqual([
        "Invalid query key 'email': Field 'email' not found in schema at ''.",
      ]);
    });

    it('should resolve dotted paths through object schemas', () => {
      expect(check({ 'address.city': 'Oslo' })).toEqual([]);
      expect(check({ 'address.zip': 'x' })).toEqual([
        "Type mismatch for field 'address.zip': Query uses type 'string', but schema expects [int].",
      ]);
    });

    it('should report unknown nested fields', () => {
      expect(check({ 'address.country': 'NO' })).toEqual([
        "Invalid query key 'address.country': Field 'country' not found in schema at 'address'.",
      ]);
    });

    it('should report traversal through non-object fields', () => {
      expect(check({ 'name.first': 'Ada' })).toEqual([
        "Invalid query path 'name.first': Field 'name' at 'name' is not defined as an 'object' in the schema, cannot traverse further.",
      ]);
    });

    it('should report object nodes without an object schema', () => {
      const handBuilt = new Map<string, SchemaNode>([
        ['meta', { types: new Set<TypeTag>(['object']) }],
      ]);
      expect(validateQueryAgainstSchema({ 'meta.a': 1 }, handBuilt)).toEqual([
        "Schema definition error: Field 'meta' at 'meta' is an 'object' but lacks an object schema definition.",
      ]);
    });
  });

  describe('logical operators', () => {
    it('should validate each branch against the same scope', () => {
      expect(check({ $or: [{ name: 'A' }, { name: 5 }] })).toEqual([
        "Type mismatch for field '$or[1].name': Query uses type 'int', but schema expects [string].",
      ]);
    });

    it('should require an array of documents', () => {
      expect(check({ $or: {} })).toEqual([
        "Invalid value for operator '$or' at '$or': Expected an array of query documents.",
      ]);
      expect(check({ $nor: [1] })).toEqual([
        "Invalid element in '$nor' array at '$nor[0]': Expected a query document.",
      ]);
    });

    it('should warn about empty arrays', () => {
      expect(check({ $and: [] })).toEqual(["Warning: Operator '$and' at '$and' has an empty array."]);
    });

    it('should check the shape of a filter-level $not', () => {
      expect(check({ $not: 5 })).toEqual([
        "Invalid value for operator '$not' at '$not': Expected an operator expression (document) or a regex pattern.",
      ]);
      expect(check({ $not: /x/ })).toEqual([]);
    });

    it('should report unknown operators and skip context-free known ones', () => {
      expect(check({ $foo: 1 })).toEqual(["Unknown operator '$foo' used at '$foo'."]);
      expect(check({ $comment: 'audit', $where: 'true' })).toEqual([]);
    });

    it('should enforce the depth limit', () => {
      expect(check({ $or: [{ $or: [{ name: 'a' }] }] }, 1)).toEqual([
        "Query nesting at '$or[0].$or[0]' exceeds the maximum depth of 1.",
      ]);
    });
  });

  describe('operator blocks', () => {
    it('should accept well-typed comparisons', () => {
      expect(check({ age: { $gte: 18, $lt: 65 }, name: { $ne: 'Bob' } })).toEqual([]);
    });

    it('should report mistyped comparison values', () => {
      expect(check({ age: { $gt: 'x' } })).toEqual([
        "Type mismatch for operator '$gt' at 'age.$gt': Query uses type 'string', but schema expects [int].",
      ]);
    });

    it('should report unknown operators inside a block', () => {
      expect(check({ age: { $foo: 1 } })).toEqual(["Unknown operator '$foo' used at 'age.$foo'."]);
    });

    it('should report mixed keys and still check the operators', () => {
      expect(check({ age: { $gt: 'x', years: 2 } })).toEqual([
        "Invalid query structure at 'age': Cannot mix operators (like '$gt') and field names (like 'years') at the same level within a field's value.",
        "Type mismatch for operator '$gt' at 'age.$gt': Query uses type 'string', but schema expects [int].",
      ]);
    });

    it('should check every $in and $nin item', () => {
      expect(check({ age: { $in: [1, 'two', 3] } })).toEqual([
        "Type mismatch for item in '$in' array at 'age.$in[1]': Item type is 'string', but schema expects [int].",
      ]);
      expect(check({ age: { $nin: 5 } })).toEqual([
        "Invalid value for operator '$nin' at 'age.$nin': Expected an array.",
      ]);
    });

    it('should require a boolean for $exists', () => {
      expect(check({ nickname: { $exists: false } })).toEqual([]);
      expect(check({ nickname: { $exists: 1 } })).toEqual([
        "Invalid value for operator '$exists' at 'nickname.$exists': Expected boolean (true/false).",
      ]);
    });

    it('should compare $type against the observed types', () => {
      expect(check({ age: { $type: 'number' } })).toEqual([]);
      expect(check({ age: { $type: 16 } })).toEqual([]);
      expect(check({ age: { $type: 'string' } })).toEqual([
        "Warning: Operator '$type' at 'age.$type' checks for type 'string', which might not be among the expected schema types [int].",
      ]);
      expect(check({ age: { $type: 'banana' } })).toEqual([
        "Invalid value for operator '$type' at 'age.$type': Unknown BSON type 'banana'.",
      ]);
    });

    it('should check every $type item after an invalid one', () => {
      expect(check({ age: { $type: [true, 'banana', 'int'] } })).toEqual([
        "Invalid value for operator '$type' at 'age.$type': Expected BSON type string (e.g., 'string') or number (e.g., 2).",
        "Invalid value for operator '$type' at 'age.$type': Unknown BSON type 'banana'.",
      ]);
    });

    it('should warn about $regex on non-string fields', () => {
      expect(check({ name: { $regex: '^A', $options: 'i' } })).toEqual([]);
      expect(check({ age: { $regex: '^1' } })).toEqual([
        "Usage warning for operator '$regex' at 'age.$regex': Field type is not 'string' in schema ([int]), $regex might not work as expected.",
      ]);
    });

    it('should only allow $size on arrays', () => {
      expect(check({ tags: { $size: 2 } })).toEqual([]);
      expect(check({ name: { $size: 2 } })).toEqual([
        "Usage error for operator '$size' at 'name.$size': Field type is not 'array' in schema ([string]).",
      ]);
      expect(check({ tags: { $size: 'two' } })).toEqual([
        "Invalid value for operator '$size' at 'tags.$size': Expected an integer size.",
      ]);
    });

    it('should warn about $mod on non-numeric fields', () => {
      expect(check({ age: { $mod: [2, 0] } })).toEqual([]);
      expect(check({ name: { $mod: [2, 0] } })).toEqual([
        "Usage warning for operator '$mod' at 'name.$mod': Field type is not numeric in schema ([string]).",
      ]);
    });

    it('should check $all items against the element schema', () => {
      expect(check({ tags: { $all: ['a', 1] } })).toEqual([
        "Type mismatch for item in '$all' array at 'tags.$all[1]': Item type is 'int', but array element schema expects [string].",
      ]);
    });

    it('should skip element checks for arrays only ever seen empty', () => {
      expect(check({ history: { $all: [1, 'x'] } })).toEqual([]);
      expect(check({ history: { $elemMatch: { $gt: 1 } } })).toEqual([]);
    });
  });

  describe('$elemMatch', () => {
    it('should validate object elements as a nested filter', () => {
      expect(check({ scores: { $elemMatch: { subject: 'math', score: { $gt: 8 } } } })).toEqual([]);
    });

    it('should report unknown element fields with the full path', () => {
      expect(check({ scores: { $elemMatch: { grade: 'A' } } })).toEqual([
        "Invalid query key 'scores.$elemMatch.grade': Field 'grade' not found in schema at 'scores.$elemMatch'.",
      ]);
    });

    it('should apply logical operators against the element schema', () => {
      expect(check({ scores: { $elemMatch: { $or: [{ grade: 'A' }] } } })).toEqual([
        "Invalid query key 'scores.$elemMatch.$or[0].grade': Field 'grade' not found in schema at 'scores.$elemMatch.$or[0]'.",
      ]);
    });

    it('should check primitive elements as an operator block', () => {
      expect(check({ tags: { $elemMatch: { $gt: 5 } } })).toEqual([
        "Type mismatch for operator '$gt' at 'tags.$elemMatch.$gt': Query uses type 'int', but schema expects [string].",
      ]);
    });

    it('should only allow $elemMatch on arrays', () => {
      expect(check({ name: { $elemMatch: { a: 1 } } })).toEqual([
        "Usage error for operator '$elemMatch' at 'name.$elemMatch': Field type is not 'array' in schema ([string]).",
      ]);
    });
  });

  describe('field-level $not', () => {
    it('should check the negated block against the same field', () => {
      expect(check({ age: { $not: { $gt: 'x' } } })).toEqual([
        "Type mismatch for operator '$gt' at 'age.$not.$gt': Query uses type 'string', but schema expects [int].",
      ]);
    });

    it('should accept a regex on string fields and warn elsewhere', () => {
      expect(check({ name: { $not: /^A/ } })).toEqual([]);
      expect(check({ age: { $not: /^1/ } })).toEqual([
        "Usage warning for operator '$not' at 'age.$not': Field type is not 'string' in schema ([int]), a regex might not work as expected.",
      ]);
    });

    it('should reject a field document under $not', () => {
      expect(check({ age: { $not: { years: 1 } } })).toEqual([
        "Invalid value for operator '$not' at 'age.$not': Expected an operator expression, not a field document.",
      ]);
    });
  });
});

describe('QueryValidator', () => {
  it('should run only the syntax pass without a schema', () => {
    const validator = new QueryValidator();
    expect(validator.validate({ email: 'x' })).toEqual({ valid: true, errors: [] });
  });

  it('should report syntax errors before checking the schema', () => {
    const validator = new QueryValidator(schema);
    expect(validator.validate({ email: { $foo: 1 } })).toEqual({
      valid: false,
      errors: ["Unknown operator '$foo' used at 'email.$foo'."],
    });
  });

  it('should run the schema pass on well-formed filters', () => {
    const validator = new QueryValidator(schema);
    expect(validator.validate({ _id: new ObjectId() })).toEqual({
      valid: false,
      errors: ["Invalid query key '_id': Field '_id' not found in schema at ''."],
    });
    expect(validator.validate({ name: 'Ada' })).toEqual({ valid: true, errors: [] });
  });

  it('should pass the depth limit to both passes', () => {
    const validator = new QueryValidator(schema, { maxDepth: 1 });
    expect(validator.validateSyntax({ a: { b: { c: 1 } } })).toEqual({
      valid: false,
      errors: ["Query nesting at 'a.b' exceeds the maximum depth of 1."],
    });
  });
});
