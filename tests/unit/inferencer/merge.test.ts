/**
 * Unit tests for schema node merging
 */

import { describe, it, expect } from 'vitest';
import {
  createSchemaNode,
  emptyArrayElementNode,
  mergeCollectionSchemas,
  mergeSchemaNodes,
  primitiveNode,
  unknownNode,
} from '../../../src/lib/inferencer/index.js';
import type { SchemaNode, TypeTag } from '../../../src/types/data-model.js';

function node(tags: TypeTag[], fields?: Record<string, SchemaNode>, element?: SchemaNode): SchemaNode {
  return createSchemaNode(
    tags,
    fields !== undefined ? new Map(Object.entries(fields)) : undefined,
    element,
  );
}

describe('mergeSchemaNodes', () => {
  it('should union primitive types', () => {
    const merged = mergeSchemaNodes(primitiveNode('int'), primitiveNode('string'));
    expect(merged).toEqual(node(['int', 'string']));
  });

  it('should merge object schemas key-wise', () => {
    const a = node(['object'], { x: primitiveNode('int'), shared: primitiveNode('int') });
    const b = node(['object'], { y: primitiveNode('string'), shared: primitiveNode('double') });

    expect(mergeSchemaNodes(a, b)).toEqual(
      node(['object'], {
        x: primitiveNode('int'),
        y: primitiveNode('string'),
        shared: node(['int', 'double']),
      }),
    );
  });

  it('should keep the object schema of the side that has one', () => {
    const a = primitiveNode('null');
    const b = node(['object'], { city: primitiveNode('string') });

    expect(mergeSchemaNodes(a, b)).toEqual(
      node(['null', 'object'], { city: primitiveNode('string') }),
    );
  });

  it('should drop the empty-array placeholder once an element type is known', () => {
    const empty = node(['array'], undefined, emptyArrayElementNode());
    const strings = node(['array'], undefined, primitiveNode('string'));

    expect(mergeSchemaNodes(empty, strings)).toEqual(
      node(['array'], undefined, primitiveNode('string')),
    );
    expect(mergeSchemaNodes(strings, empty)).toEqual(
      node(['array'], undefined, primitiveNode('string')),
    );
  });

  it('should keep the placeholder when both arrays were empty', () => {
    const empty = node(['array'], undefined, emptyArrayElementNode());
    expect(mergeSchemaNodes(empty, node(['array'], undefined, emptyArrayElementNode()))).toEqual(empty);
  });

  it('should not mutate its inputs', () => {
    const a = node(['object'], { x: primitiveNode('int') });
    const b = node(['object'], { y: primitiveNode('bool') });
    mergeSchemaNodes(a, b);

    expect(a).toEqual(node(['object'], { x: primitiveNode('int') }));
    expect(b).toEqual(node(['object'], { y: primitiveNode('bool') }));
  });

  describe('degradation', () => {
    it('should keep the valid side when the existing side is invalid', () => {
      const diagnostics: string[] = [];
      const valid = primitiveNode('int');

      expect(mergeSchemaNodes('junk', valid, diagnostics)).toBe(valid);
      expect(diagnostics).toEqual(['Invalid existing schema at <root>; keeping the new schema.']);
    });

    it('should keep the valid side when the new side is invalid', () => {
      const diagnostics: string[] = [];
      const valid = primitiveNode('int');

      expect(mergeSchemaNodes(valid, { types: ['int'] }, diagnostics)).toBe(valid);
      expect(diagnostics).toEqual(['Invalid new schema at <root>; keeping the existing schema.']);
    });

    it('should fall back to unknown when neither side is valid', () => {
      const diagnostics: string[] = [];

      expect(mergeSchemaNodes(null, 42, diagnostics, 'meta')).toEqual(unknownNode());
      expect(diagnostics).toEqual([
        "Neither side of the schema merge at 'meta' is a valid schema node; using 'unknown'.",
      ]);
    });

    it('should prefer the valid side of a corrupt nested key', () => {
      const diagnostics: string[] = [];
      const corrupt = {
        types: new Set<TypeTag>(['object']),
        objectSchema: new Map<string, unknown>([['k', 'bad']]),
      };
      const valid = node(['object'], { k: primitiveNode('int') });

      expect(mergeSchemaNodes(corrupt, valid, diagnostics)).toEqual(valid);
      expect(diagnostics).toEqual([
        "Invalid schema for key 'k' in nested schema merge; keeping the other side.",
      ]);
    });

    it('should reject type sets holding unknown tags', () => {
      const diagnostics: string[] = [];
      const bogus = { types: new Set(['integer']) };

      expect(mergeSchemaNodes(bogus, primitiveNode('bool'), diagnostics)).toEqual(primitiveNode('bool'));
      expect(diagnostics).toHaveLength(1);
    });
  });

  describe('merge laws', () => {
    const samples: SchemaNode[] = [
      primitiveNode('int'),
      node(['string', 'null']),
      node(['object'], { a: primitiveNode('int'), b: node(['array'], undefined, primitiveNode('string')) }),
      node(['object'], { a: primitiveNode('double'), c: primitiveNode('bool') }),
      node(['array'], undefined, emptyArrayElementNode()),
      node(['array'], undefined, node(['object'], { id: primitiveNode('objectId') })),
    ];

    it('should be commutative', () => {
      for (const a of samples) {
        for (const b of samples) {
          expect(mergeSchemaNodes(a, b)).toEqual(mergeSchemaNodes(b, a));
        }
      }
    });

    it('should be associative', () => {
      for (const a of samples) {
        for (const b of samples) {
          for (const c of samples) {
            expect(mergeSchemaNodes(mergeSchemaNodes(a, b), c)).toEqual(
              mergeSchemaNodes(a, mergeSchemaNodes(b, c)),
            );
          }
        }
      }
    });

    it('should be idempotent', () => {
      for (const a of samples) {
        const copy = createSchemaNode(a.types, a.objectSchema, a.elementSchema);
        expect(mergeSchemaNodes(a, a)).toEqual(a);
        expect(mergeSchemaNodes(a, copy)).toEqual(a);
      }
    });
  });
});

describe('mergeCollectionSchemas', () => {
  it('should merge top-level fields', () => {
    const a = new Map([['name', primitiveNode('string')]]);
    const b = new Map([
      ['name', primitiveNode('null')],
      ['age', primitiveNode('int')],
    ]);

    expect(mergeCollectionSchemas(a, b)).toEqual(
      new Map([
        ['name', node(['string', 'null'])],
        ['age', primitiveNode('int')],
      ]),
    );
  });
});
