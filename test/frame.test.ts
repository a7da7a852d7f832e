import { RecordFrame, RecordParsingError, inferType, printSchema, recordEngine } from '../src/index';

describe('RecordFrame', () => {
  describe('Construction', () => {
    test('should collect columns across records', () => {
      const frame = RecordFrame.fromRecords([{ a: 1, b: 'x' }, { b: 'y', c: null }]);

      expect(frame.columns).toEqual(['a', 'b', 'c']);
      expect(frame.height).toBe(2);
      expect(frame.toRecords()).toEqual([
        { a: 1, b: 'x', c: null },
        { a: null, b: 'y', c: null },
      ]);
    });

    test('should place non-object records in the anonymous column', () => {
      const frame = RecordFrame.fromRecords([1, 'x']);

      expect(frame.columns).toEqual(['']);
      expect(frame.toRecords()).toEqual([{ '': 1 }, { '': 'x' }]);
    });

    test('should read newline-delimited JSON', () => {
      const frame = RecordFrame.fromNdjson('{"a":1}\n\n{"a":2}\n');

      expect(frame.height).toBe(2);
      expect(frame.toRecords()).toEqual([{ a: 1 }, { a: 2 }]);
    });

    test('should throw error for invalid JSON lines', () => {
      expect(() => RecordFrame.fromNdjson('{"a":1}\n{oops')).toThrow(RecordParsingError);
      expect(() => RecordFrame.fromNdjson('{"a":1}\n{oops')).toThrow(/^Invalid JSON on line 2: /);

      let caught: unknown;
      try {
        RecordFrame.fromNdjson('\n\n[1,');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(RecordParsingError);
      if (caught instanceof RecordParsingError) {
        expect(caught.line).toBe(3);
        expect(caught.cause).toBeInstanceOf(SyntaxError);
        expect(caught.name).toBe('RecordParsingError');
      }
    });
  });

  describe('Operations', () => {
    test('should explode lists into rows', () => {
      const frame = RecordFrame.fromRecords([
        { id: 1, xs: [1, 2] },
        { id: 2, xs: [] },
        { id: 3, xs: null },
      ]);

      expect(frame.explode('xs').toRecords()).toEqual([
        { id: 1, xs: 1 },
        { id: 1, xs: 2 },
        { id: 2, xs: null },
        { id: 3, xs: null },
      ]);
    });

    test('should throw error when exploding non-lists', () => {
      expect(() => RecordFrame.fromRecords([{ xs: 1 }]).explode('xs')).toThrow('Column "xs" does not hold lists');
    });

    test('should unnest the listed struct fields', () => {
      const frame = RecordFrame.fromRecords([
        { id: 1, s: { foo: 1, extra: 2 } },
        { id: 2, s: null },
      ]);
      const unnested = frame.unnest('s', 's.', ['foo', 'bar']);

      expect(unnested.columns).toEqual(['id', 's.foo', 's.bar']);
      expect(unnested.toRecords()).toEqual([
        { id: 1, 's.foo': 1, 's.bar': null },
        { id: 2, 's.foo': null, 's.bar': null },
      ]);
    });

    test('should let a field take over its parent column name', () => {
      expect(RecordFrame.fromRecords([{ s: { s: 1 } }]).unnest('s', '', ['s']).toRecords()).toEqual([{ s: 1 }]);
    });

    test('should throw error when unnesting onto an existing column', () => {
      const frame = RecordFrame.fromRecords([{ foo: 1, s: { foo: 2 } }]);

      expect(() => frame.unnest('s', '', ['foo'])).toThrow('Column "foo" already exists');
      expect(() => RecordFrame.fromRecords([{ s: 1 }]).unnest('s', '', ['a'])).toThrow('Column "s" does not hold structs');
    });

    test('should rename columns simultaneously', () => {
      const renamed = RecordFrame.fromRecords([{ a: 1, b: 2 }]).rename(
        new Map([
          ['a', 'b'],
          ['b', 'a'],
        ])
      );

      expect(renamed.columns).toEqual(['b', 'a']);
      expect(renamed.toRecords()).toEqual([{ b: 1, a: 2 }]);
    });

    test('should throw error when renaming onto an existing column', () => {
      const frame = RecordFrame.fromRecords([{ a: 1, b: 2 }]);

      expect(() => frame.rename(new Map([['a', 'b']]))).toThrow('Renaming produces duplicate column "b"');
    });

    test('should select columns in the given order', () => {
      const frame = RecordFrame.fromRecords([{ a: 1, b: 2, c: 3 }]);

      expect(frame.select(['c', 'a']).columns).toEqual(['c', 'a']);
      expect(frame.select(['c', 'a']).toRecords()).toEqual([{ c: 3, a: 1 }]);
      expect(() => frame.select(['z'])).toThrow('Unknown column "z"');
    });

    test('should add typed null columns', () => {
      const frame = RecordFrame.fromRecords([{ a: 1 }]).withNullColumn('z', 'float32');

      expect(frame.dtypeOf('z')).toBe('float32');
      expect(frame.dtypeOf('a')).toBeUndefined();
      expect(frame.toRecords()).toEqual([{ a: 1, z: null }]);
      expect(() => frame.withNullColumn('a', 'int8')).toThrow('Column "a" already exists');
    });

    test('should expose the frame through the engine interface', () => {
      const frame = RecordFrame.fromRecords([{ a: { b: 1 } }]);
      const unnested = recordEngine.unnest(frame, 'a', 'a.', ['b']);

      expect(recordEngine.columns(unnested)).toEqual(['a.b']);
      expect(recordEngine.rename(unnested, new Map([['a.b', 'b']])).toRecords()).toEqual([{ b: 1 }]);
    });
  });

  describe('Type inference', () => {
    test('should infer nested types across records', () => {
      const type = inferType([
        { attribute: 'test', nested: { foo: 1.5, bar: -8, vector: [0, 1, 2] } },
        { nested: { foo: 2, vector: [] }, extra: null },
      ]);

      expect(type).toEqual({
        kind: 'struct',
        fields: [
          { name: 'attribute', type: { kind: 'scalar', dtype: 'utf8' } },
          {
            name: 'nested',
            type: {
              kind: 'struct',
              fields: [
                { name: 'foo', type: { kind: 'scalar', dtype: 'float64' } },
                { name: 'bar', type: { kind: 'scalar', dtype: 'int64' } },
                { name: 'vector', type: { kind: 'list', element: { kind: 'scalar', dtype: 'int64' } } },
              ],
            },
          },
        ],
      });
    });

    test('should widen integers to floats', () => {
      expect(inferType([{ x: 1 }, { x: 1.5 }])).toEqual({
        kind: 'struct',
        fields: [{ name: 'x', type: { kind: 'scalar', dtype: 'float64' } }],
      });
    });

    test('should infer anonymous root values', () => {
      expect(inferType([1, 2])).toEqual({
        kind: 'struct',
        fields: [{ name: '', type: { kind: 'scalar', dtype: 'int64' } }],
      });
    });

    test('should render inferred types as a schema', () => {
      expect(printSchema(inferType([{ id: 1, tags: ['a'] }]))).toBe('id: Int64\ntags: List(\n    Utf8\n)');
    });

    test('should throw error for unsupported or conflicting values', () => {
      expect(() => inferType([{ flag: true }])).toThrow('Cannot infer a datatype for boolean values of "flag"');
      expect(() => inferType([{ x: 1 }, { x: 'a' }])).toThrow('Conflicting datatypes for "x"');
      expect(() => inferType([{ x: [1] }, { x: { y: 1 } }])).toThrow('Conflicting datatypes for "x"');
    });
  });
});
