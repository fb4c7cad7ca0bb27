import { describe, expect, it } from 'vitest';

import { MissingAttributeError, TypeMismatchError, UnresolvedReferenceError } from '../../src/errors';
import { checkType, typeOfLiteral } from '../../src/values/types';
import { BindingLookup, interpolate, ObjectValue, ReferenceValue, ScalarValue, Value } from '../../src/values/Value';

function bindings(values: Record<string, Value>): BindingLookup {
  return { lookup: (id) => values[id] };
}

describe('Value', () => {
  describe('ScalarValue', () => {
    it('should keep its literal and sensitivity', () => {
      const value = new ScalarValue('postgres');
      expect(value.resolvedValue()).toBe('postgres');
      expect(value.isSensitive()).toBe(false);
      expect(new ScalarValue(5432, true).isSensitive()).toBe(true);
    });

    it('should only add sensitivity when marked', () => {
      const plain = new ScalarValue('x');
      const marked = plain.markSensitive();

      expect(marked.isSensitive()).toBe(true);
      expect(plain.isSensitive()).toBe(false);
      expect(marked.markSensitive()).toBe(marked);
    });

    it('should have no attributes', () => {
      expect(() => new ScalarValue('x').at(['length'], 'var.name')).toThrow(MissingAttributeError);
    });
  });

  describe('ObjectValue', () => {
    it('should lift nested literals in insertion order', () => {
      const value = Value.from({ name: 'db', tags: { team: 'platform', tier: 1 } });

      expect(value).toBeInstanceOf(ObjectValue);
      expect(value.resolvedValue()).toEqual({ name: 'db', tags: { team: 'platform', tier: 1 } });
      expect(Object.keys(value.resolvedValue())).toEqual(['name', 'tags']);
    });

    it('should be sensitive when any entry is', () => {
      const value = new ObjectValue([
        ['endpoint', new ScalarValue('db.example.com')],
        ['password', new ScalarValue('s3cr3t', true)],
      ]);

      expect(value.isSensitive()).toBe(true);
      expect(value.get('endpoint')?.isSensitive()).toBe(false);
      expect(value.get('password')?.isSensitive()).toBe(true);
    });

    it('should make every entry sensitive when the object is', () => {
      const value = Value.from({ user: 'admin', nested: { port: 5432 } }, true);

      expect(value.find(['user'])?.isSensitive()).toBe(true);
      expect(value.find(['nested', 'port'])?.isSensitive()).toBe(true);
    });

    it('should descend attribute paths', () => {
      const value = Value.from({ nested: { port: 5432 } });

      expect(value.at(['nested', 'port'], 'db').resolvedValue()).toBe(5432);
      expect(value.find(['nested', 'host'])).toBeUndefined();
    });

    it('should name the owner and path of a missing attribute', () => {
      const value = Value.from({ nested: { port: 5432 } });

      expect(() => value.at(['nested', 'host'], 'database_instance.main')).toThrow('"database_instance.main" has no attribute "nested.host"');
    });
  });

  describe('ReferenceValue', () => {
    it('should throw UnresolvedReferenceError before the target is bound', () => {
      const reference = new ReferenceValue('network.main', ['id'], bindings({}));

      expect(() => reference.isSensitive()).toThrow(UnresolvedReferenceError);
      expect(() => reference.resolvedValue()).toThrow(UnresolvedReferenceError);
      expect(() => reference.resolvedValue()).toThrow('Reference "network.main.id" is not resolved yet');
    });

    it('should read through to the bound value', () => {
      const reference = new ReferenceValue('network.main', ['id'], bindings({ 'network.main': Value.from({ id: 'net-1' }) }));

      expect(reference.resolvedValue()).toBe('net-1');
      expect(reference.resolve()).toBeInstanceOf(ScalarValue);
    });

    it('should report only the sensitivity of the referenced attribute', () => {
      const bound = new ObjectValue([
        ['endpoint', new ScalarValue('db.example.com')],
        ['password', new ScalarValue('s3cr3t', true)],
      ]);
      const table = bindings({ db: bound });

      expect(new ReferenceValue('db', ['endpoint'], table).isSensitive()).toBe(false);
      expect(new ReferenceValue('db', ['password'], table).isSensitive()).toBe(true);
      expect(new ReferenceValue('db', [], table).isSensitive()).toBe(true);
    });

    it('should not read as non-sensitive before a sensitive target is bound', () => {
      const values = new Map<string, Value>();
      const reference = new ReferenceValue('db_password', [], { lookup: (id) => values.get(id) });

      expect(() => reference.isSensitive()).toThrow('Reference "db_password" is not resolved yet');

      values.set('db_password', new ScalarValue('test-secret', true));
      expect(reference.isSensitive()).toBe(true);
    });

    it('should fail on a missing attribute of a bound target', () => {
      const reference = new ReferenceValue('db', ['port'], bindings({ db: Value.from({ endpoint: 'x' }) }));

      expect(() => reference.resolvedValue()).toThrow(MissingAttributeError);
    });
  });

  describe('interpolate', () => {
    it('should concatenate text and rendered scalars', () => {
      const result = interpolate(['port=', new ScalarValue(5432), ' ssl=', new ScalarValue(true)]);

      expect(result.resolvedValue()).toBe('port=5432 ssl=true');
      expect(result.isSensitive()).toBe(false);
    });

    it('should be sensitive when any fragment is', () => {
      const result = interpolate(['user:', new ScalarValue('s3cr3t', true), '@host']);

      expect(result.resolvedValue()).toBe('user:s3cr3t@host');
      expect(result.isSensitive()).toBe(true);
    });

    it('should resolve references inside fragments', () => {
      const table = bindings({ lb: Value.from({ dns: 'lb.example.com' }) });
      const result = interpolate(['https://', new ReferenceValue('lb', ['dns'], table)]);

      expect(result.resolvedValue()).toBe('https://lb.example.com');
    });

    it('should reject object fragments', () => {
      expect(() => interpolate(['tags=', Value.from({ team: 'a' })], 'output.tags')).toThrow(TypeMismatchError);
      expect(() => interpolate(['tags=', Value.from({ team: 'a' })], 'output.tags')).toThrow('Value for "output.tags" must be of type string, got object');
    });

    it('should propagate unresolved references', () => {
      expect(() => interpolate([new ReferenceValue('db', ['endpoint'], bindings({}))])).toThrow(UnresolvedReferenceError);
    });
  });

  describe('type checks', () => {
    it('should name literal types', () => {
      expect(typeOfLiteral('a')).toBe('string');
      expect(typeOfLiteral(1.5)).toBe('number');
      expect(typeOfLiteral(false)).toBe('bool');
      expect(typeOfLiteral({ a: 1 })).toBe('object');
    });

    it('should accept matching values', () => {
      expect(checkType('port', 'number', 5432)).toBe(5432);
      expect(checkType('tags', 'object', { team: 'a' })).toEqual({ team: 'a' });
    });

    it('should describe what it got on a mismatch', () => {
      expect(() => checkType('port', 'number', '5432')).toThrow('Value for "port" must be of type number, got string');
      expect(() => checkType('port', 'number', Number.NaN)).toThrow('got non-finite number');
      expect(() => checkType('tags', 'object', ['a'])).toThrow('got list');
      expect(() => checkType('tags', 'object', null)).toThrow('got null');
    });
  });
});
