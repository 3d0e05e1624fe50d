import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { SchemaValidationError } from '../errors/index.js';
import { parse } from '../parser/index.js';
import { array, bool, double, enumValue, getPath, int, nullValue, object, str } from '../value/index.js';
import { parseSchema } from './parser.js';
import { Schema } from './schema.js';
import { field, t } from './types.js';

function serverSchema(): Schema {
  return new Schema()
    .addEnum('Level', ['debug', 'info'])
    .addObjectSchema('Server', {
      host: field(t.string(), {
        constraints: [
          { kind: 'minLength', value: 3 },
          { kind: 'maxLength', value: 10 },
        ],
      }),
      port: field(t.integer(), {
        constraints: [
          { kind: 'minValue', value: 1 },
          { kind: 'maxValue', value: 65535 },
        ],
      }),
      level: field(t.enum('Level'), { required: false }),
      tags: field(t.array(t.string()), { required: false, defaultValue: array() }),
    })
    .addObjectSchema('Cluster', {
      servers: field(t.array(t.object('Server'))),
    })
    .setRootType(t.object('Server'));
}

describe('Schema', () => {
  describe('objects', () => {
    const schema = serverSchema();

    it('should accept a conforming tree', () => {
      expect(schema.validate(parse('host = "alpha"; port = 80; level = debug'))).toEqual([]);
    });

    it('should report missing required fields', () => {
      expect(schema.validate(parse('port = 80'))).toEqual([
        { path: 'host', message: "Required field 'host' is missing", expectedType: 'string' },
      ]);
    });

    it('should report an absent required field even when it declares a default', () => {
      const withDefault = new Schema()
        .addObjectSchema('Entry', { name: field(t.string(), { defaultValue: str('unnamed') }) })
        .setRootType(t.object('Entry'));
      expect(withDefault.validate(object())).toEqual([
        { path: 'name', message: "Required field 'name' is missing", expectedType: 'string' },
      ]);
    });

    it('should not report absent optional fields', () => {
      expect(schema.validate(parse('host = "alpha"; port = 80'))).toEqual([]);
    });

    it('should report undeclared fields', () => {
      expect(schema.validate(parse('host = "alpha"; port = 80; extra = 1'))).toEqual([
        { path: 'extra', message: "Unexpected field 'extra'", actualType: 'integer' },
      ]);
    });

    it('should report every failure in one pass', () => {
      const messages = schema
        .validate(parse('port = "80"; other = true'))
        .map((error) => `${error.path}: ${error.message}`);
      expect(messages).toEqual([
        "host: Required field 'host' is missing",
        'port: Type mismatch',
        "other: Unexpected field 'other'",
      ]);
    });

    it('should reject a non-object where an object schema is expected', () => {
      expect(schema.validate(array())).toEqual([
        { path: '', message: 'Type mismatch', expectedType: 'object(Server)', actualType: 'array' },
      ]);
    });

    it('should report unknown object schemas', () => {
      const unknown = new Schema().setRootType(t.object('Nope'));
      expect(unknown.validate(object())).toEqual([
        {
          path: '',
          message: "Unknown object schema 'Nope'",
          expectedType: 'object(Nope)',
          actualType: 'object',
        },
      ]);
    });

    it('should build paths through arrays and nested objects', () => {
      schema.setRootType(t.object('Cluster'));
      const config = parse(`
        servers = [
          { host = "alpha"; port = 80 },
          { host = "b"; port = 0 },
        ]
      `);

      expect(schema.validate(config)).toEqual([
        { path: 'servers[1].host', message: 'String length 1 is less than minimum 3' },
        { path: 'servers[1].port', message: 'Value 0 is less than minimum 1' },
      ]);
      schema.setRootType(t.object('Server'));
    });
  });

  describe('primitives', () => {
    it('should match kinds exactly', () => {
      const schema = new Schema();
      expect(schema.validateField(int(1), field(t.integer()))).toEqual([]);
      expect(schema.validateField(double(1), field(t.integer()), 'n')).toEqual([
        { path: 'n', message: 'Type mismatch', expectedType: 'integer', actualType: 'double' },
      ]);
      expect(schema.validateField(int(1), field(t.double()), 'n')).toEqual([
        { path: 'n', message: 'Type mismatch', expectedType: 'double', actualType: 'integer' },
      ]);
      expect(schema.validateField(nullValue(), field(t.null()))).toEqual([]);
      expect(schema.validateField(bool(false), field(t.boolean()))).toEqual([]);
      expect(schema.validateField(enumValue('a'), field(t.string()))).toHaveLength(1);
    });
  });

  describe('enums', () => {
    const schema = serverSchema();

    it('should reject values outside the enum', () => {
      expect(schema.validate(parse('host = "alpha"; port = 80; level = trace'))).toEqual([
        {
          path: 'level',
          message: "Invalid enum value 'trace', expected one of: debug, info",
          expectedType: 'enum(Level)',
          actualType: 'enum(trace)',
        },
      ]);
    });

    it('should reject strings where an enum is expected', () => {
      expect(schema.validate(parse('host = "alpha"; port = 80; level = "debug"'))).toEqual([
        { path: 'level', message: 'Type mismatch', expectedType: 'enum(Level)', actualType: 'string' },
      ]);
    });

    it('should report unknown enum types', () => {
      const unknown = new Schema().setRootType(t.enum('Nope'));
      expect(unknown.validate(enumValue('x'))).toEqual([
        { path: '', message: "Unknown enum type 'Nope'", expectedType: 'enum(Nope)', actualType: 'enum' },
      ]);
    });

    it('should check schema-text references to enums as enums', () => {
      const fromText = parseSchema('enum Level { debug, info }\nLogging {\n  level: Level;\n}');
      fromText.setRootType(t.object('Logging'));

      expect(fromText.validate(parse('level = info'))).toEqual([]);
      expect(fromText.validate(parse('level = trace'))).toEqual([
        {
          path: 'level',
          message: "Invalid enum value 'trace', expected one of: debug, info",
          expectedType: 'enum(Level)',
          actualType: 'enum(trace)',
        },
      ]);
    });
  });

  describe('unions and optionals', () => {
    const union = new Schema().setRootType(t.union(t.string(), t.integer()));

    it('should accept any member of a union', () => {
      expect(union.validate(str('a'))).toEqual([]);
      expect(union.validate(int(1))).toEqual([]);
    });

    it('should report exactly one error when no member matches', () => {
      expect(union.validate(bool(true))).toEqual([
        {
          path: '',
          message: 'Value does not match any type in union',
          expectedType: 'union(string, integer)',
          actualType: 'boolean',
        },
      ]);
    });

    it('should accept null or the inner type for optionals', () => {
      const optional = new Schema().setRootType(t.optional(t.string()));
      expect(optional.validate(nullValue())).toEqual([]);
      expect(optional.validate(str('x'))).toEqual([]);
      expect(optional.validate(int(1))).toEqual([
        { path: '', message: 'Type mismatch', expectedType: 'string', actualType: 'integer' },
      ]);
    });
  });

  describe('constraints', () => {
    const schema = serverSchema();

    it('should check string length bounds', () => {
      expect(schema.validate(parse('host = "abcdefghijk"; port = 80'))).toEqual([
        { path: 'host', message: 'String length 11 exceeds maximum 10' },
      ]);
    });

    it('should measure length in UTF-8 bytes', () => {
      const atMostTwo = field(t.string(), { constraints: [{ kind: 'maxLength', value: 2 }] });
      expect(schema.validateField(str('é'), atMostTwo)).toEqual([]);
      expect(schema.validateField(str('éé'), atMostTwo, 'name')).toEqual([
        { path: 'name', message: 'String length 4 exceeds maximum 2' },
      ]);
      const atLeastFour = field(t.string(), { constraints: [{ kind: 'minLength', value: 4 }] });
      expect(schema.validateField(str('héé'), atLeastFour)).toEqual([]);
    });

    it('should check numeric bounds on integers and doubles', () => {
      expect(schema.validate(parse('host = "alpha"; port = 70000'))).toEqual([
        { path: 'port', message: 'Value 70000 exceeds maximum 65535' },
      ]);
      const ratio = field(t.double(), { constraints: [{ kind: 'minValue', value: 0.5 }] });
      expect(schema.validateField(double(0.25), ratio, 'ratio')).toEqual([
        { path: 'ratio', message: 'Value 0.25 is less than minimum 0.5' },
      ]);
    });

    it('should accept every port inside the bounds', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 65535 }), (port) => {
          expect(schema.validate(object([['host', str('alpha')], ['port', int(port)]]))).toEqual([]);
        })
      );
    });

    it('should skip constraints when the type does not match', () => {
      expect(schema.validate(parse('host = 1; port = 80'))).toEqual([
        { path: 'host', message: 'Type mismatch', expectedType: 'string', actualType: 'integer' },
      ]);
    });

    it('should require patterns to match the whole string', () => {
      const definition = field(t.string(), { constraints: [{ kind: 'pattern', pattern: '[a-z]+' }] });
      expect(schema.validateField(str('abc'), definition)).toEqual([]);
      expect(schema.validateField(str('abc1'), definition, 'name')).toEqual([
        { path: 'name', message: "String 'abc1' does not match pattern [a-z]+" },
      ]);
    });

    it('should report invalid patterns as validation errors', () => {
      const definition = field(t.string(), { constraints: [{ kind: 'pattern', pattern: '(' }] });
      const [error] = schema.validateField(str('x'), definition);
      expect(error?.message).toMatch(/^Invalid pattern \(: /);
    });

    it('should consult registered custom constraints', () => {
      const custom = new Schema().registerCustomConstraint('even', (value) =>
        value.type === 'integer' && value.value % 2n !== 0n ? 'Value must be even' : undefined
      );
      const definition = field(t.integer(), { constraints: [{ kind: 'custom', name: 'even' }] });

      expect(custom.validateField(int(4), definition, 'n')).toEqual([]);
      expect(custom.validateField(int(3), definition, 'n')).toEqual([{ path: 'n', message: 'Value must be even' }]);
    });

    it('should take custom constraints from the options', () => {
      const custom = new Schema({ customConstraints: { never: () => 'Always fails' } });
      const definition = field(t.string(), { constraints: [{ kind: 'custom', name: 'never' }] });
      expect(custom.validateField(str('x'), definition, 'f')).toEqual([{ path: 'f', message: 'Always fails' }]);
    });

    it('should pass custom constraints without a registered hook', () => {
      const definition = field(t.string(), { constraints: [{ kind: 'custom', name: 'unknown' }] });
      expect(new Schema().validateField(str('x'), definition)).toEqual([]);
    });
  });

  describe('without a root type', () => {
    it('should accept every tree', () => {
      expect(new Schema().validate(parse('a = [1, { b = "c" }]'))).toEqual([]);
    });
  });

  describe('assertValid', () => {
    it('should throw with every validation error', () => {
      const schema = serverSchema();
      let caught: unknown;
      try {
        schema.assertValid(parse('extra = 1'));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SchemaValidationError);
      if (caught instanceof SchemaValidationError) {
        expect(caught.errors.map((error) => error.path)).toEqual(['host', 'port', 'extra']);
      }
    });

    it('should return quietly for valid trees', () => {
      expect(() => {
        serverSchema().assertValid(parse('host = "alpha"; port = 80'));
      }).not.toThrow();
    });
  });

  describe('applyDefaults', () => {
    it('should fill absent fields that declare a default', () => {
      const schema = serverSchema();
      const config = parse('host = "alpha"; port = 80');
      const completed = schema.applyDefaults(config);

      expect(getPath(completed, 'tags')).toEqual(array());
      expect(getPath(config, 'tags')).toBeUndefined();
      expect(getPath(completed, 'level')).toBeUndefined();
    });

    it('should keep values that are present', () => {
      const completed = serverSchema().applyDefaults(parse('host = "alpha"; port = 80; tags = ["x"]'));
      expect(getPath(completed, 'tags[0]')).toEqual(str('x'));
    });

    it('should follow arrays of objects', () => {
      const schema = serverSchema().setRootType(t.object('Cluster'));
      const completed = schema.applyDefaults(parse('servers = [{ host = "alpha"; port = 80 }]'));
      expect(getPath(completed, 'servers[0].tags')).toEqual(array());
    });

    it('should copy the tree when there is no root type', () => {
      const config = parse('a = 1');
      const copy = new Schema().applyDefaults(config);
      expect(copy).toEqual(config);
      expect(copy).not.toBe(config);
    });
  });
});
