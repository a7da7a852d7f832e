import {
  CompiledSchema,
  UnpackPlanner,
  UnpackPlanningError,
  compile,
  missingColumns,
  planUnpack,
  sourceColumns,
} from '../src/index';

const SCHEMA = 'text:Utf8,json:Struct(foo:Int64,bar:Int64)';

describe('UnpackPlanner', () => {
  describe('Eager renaming', () => {
    test('should unnest structs under their full json path', () => {
      const plan = planUnpack(compile(SCHEMA));

      expect(plan.strategy).toBe('eager');
      expect(plan.steps).toEqual([{ op: 'unnest', column: 'json', prefix: 'json.', fields: ['foo', 'bar'] }]);
      expect(plan.leaves).toEqual([
        { column: 'text', path: 'text', dtype: 'utf8' },
        { column: 'json.foo', path: 'json.foo', dtype: 'int64' },
        { column: 'json.bar', path: 'json.bar', dtype: 'int64' },
      ]);
      expect(plan.rename).toEqual(
        new Map([
          ['json.foo', 'foo'],
          ['json.bar', 'bar'],
        ])
      );
      expect(plan.select).toEqual(['text', 'foo', 'bar']);
    });

    test('should explode lists before unnesting their elements', () => {
      const plan = planUnpack(compile('text:Utf8,json:List(Struct(foo:Int64,bar:Int64))'));

      expect(plan.steps).toEqual([
        { op: 'explode', column: 'json' },
        { op: 'unnest', column: 'json', prefix: 'json.', fields: ['foo', 'bar'] },
      ]);
    });

    test('should explode nested lists once per level', () => {
      const plan = planUnpack(compile('json: List(List(Int64))'));

      expect(plan.steps).toEqual([
        { op: 'explode', column: 'json' },
        { op: 'explode', column: 'json' },
      ]);
      expect(plan.leaves).toEqual([{ column: 'json', path: 'json', dtype: 'int64' }]);
      expect(plan.rename).toEqual(new Map());
      expect(plan.select).toEqual(['json']);
    });

    test('should unnest an anonymous root struct without a prefix', () => {
      const plan = planUnpack(compile('Struct(foo:Int8)'));

      expect(plan.steps).toEqual([{ op: 'unnest', column: '', prefix: '', fields: ['foo'] }]);
      expect(plan.leaves).toEqual([{ column: 'foo', path: 'foo', dtype: 'int8' }]);
      expect(plan.rename).toEqual(new Map());
    });

    test('should rename leaves to their bound column', () => {
      const plan = planUnpack(compile('a=x: Int8, b: Struct(c=y: Int8)'));

      expect(plan.rename).toEqual(
        new Map([
          ['a', 'x'],
          ['b.c', 'y'],
        ])
      );
      expect(plan.select).toEqual(['x', 'y']);
    });
  });

  describe('Deferred renaming', () => {
    test('should keep attribute names while unpacking', () => {
      const plan = new UnpackPlanner(compile(SCHEMA), { strategy: 'deferred' }).plan();

      expect(plan.strategy).toBe('deferred');
      expect(plan.steps).toEqual([{ op: 'unnest', column: 'json', prefix: '', fields: ['foo', 'bar'] }]);
      expect(plan.leaves).toEqual([
        { column: 'text', path: 'text', dtype: 'utf8' },
        { column: 'foo', path: 'json.foo', dtype: 'int64' },
        { column: 'bar', path: 'json.bar', dtype: 'int64' },
      ]);
      expect(plan.rename).toEqual(new Map());
      expect(plan.select).toEqual(['text', 'foo', 'bar']);
    });

    test('should fall back to full json paths on collision', () => {
      const plan = planUnpack(compile('foo: Utf8, json: Struct(foo=inner: Int64)'), { strategy: 'deferred' });

      expect(plan.steps).toEqual([{ op: 'unnest', column: 'json', prefix: 'json.', fields: ['foo'] }]);
      expect(plan.rename).toEqual(new Map([['json.foo', 'inner']]));
      expect(plan.select).toEqual(['foo', 'inner']);
    });

    test('should plan schemas whose full paths collide', () => {
      const schema = compile('a_b: Int8, a: Struct(b: Struct(c: Int8))', { separator: '_' });

      expect(() => planUnpack(schema)).toThrow(UnpackPlanningError);
      expect(() => planUnpack(schema)).toThrow('Unnesting "a" would produce duplicate columns');

      const plan = planUnpack(schema, { strategy: 'deferred' });
      expect(plan.steps).toEqual([
        { op: 'unnest', column: 'a', prefix: '', fields: ['b'] },
        { op: 'unnest', column: 'b', prefix: '', fields: ['c'] },
      ]);
      expect(plan.leaves).toEqual([
        { column: 'a_b', path: 'a_b', dtype: 'int8' },
        { column: 'c', path: 'a_b_c', dtype: 'int8' },
      ]);
      expect(plan.select).toEqual(['a_b', 'c']);
    });
  });

  describe('Missing columns', () => {
    test('should list the leaves absent from a frame', () => {
      const plan = planUnpack(compile(SCHEMA));

      expect(missingColumns(plan, ['text'])).toEqual([
        { column: 'json.foo', dtype: 'int64' },
        { column: 'json.bar', dtype: 'int64' },
      ]);
      expect(missingColumns(plan, ['text', 'json.foo', 'json.bar'])).toEqual([]);
    });
  });

  describe('Source columns', () => {
    test('should keep the root fields present in a frame, in schema order', () => {
      const plan = planUnpack(compile(SCHEMA));

      expect(sourceColumns(plan, ['foo', 'json', 'extra', 'text'])).toEqual(['text', 'json']);
      expect(sourceColumns(plan, ['foo'])).toEqual([]);
    });

    test('should take the fields of a spread anonymous root struct', () => {
      const plan = planUnpack(compile('Struct(foo: Int8, bar: Int8)'));

      expect(sourceColumns(plan, ['bar', 'foo', 'other'])).toEqual(['foo', 'bar']);
      expect(sourceColumns(plan, ['', 'foo'])).toEqual(['']);
    });
  });

  describe('Error Handling', () => {
    test('should throw error for leaves without a binding', () => {
      const schema: CompiledSchema = {
        root: { kind: 'struct', fields: [{ name: 'a', type: { kind: 'scalar', dtype: 'int8' } }] },
        bindings: new Map(),
        columns: [],
        dtypes: [],
        separator: '.',
      };

      expect(() => planUnpack(schema)).toThrow('No column bound to json path "a"');
    });
  });
});
