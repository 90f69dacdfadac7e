import { describe, it, expect } from '@jest/globals';
import { OperationRegistryError } from '../../../src/core/errors';
import {
  defineOperation,
  getParameterNames,
  normalizeParameter,
  OperationRegistry,
  ParameterKind,
} from '../../../src/core/workflow/Operation';

describe('Operation', () => {
  const add = defineOperation('add', ['a', 'b'], args => Number(args.a) + Number(args.b), 'Sum two numbers.');

  it('should treat bare names as keyword parameters', () => {
    expect(normalizeParameter('a')).toEqual({ name: 'a', kind: ParameterKind.KEYWORD });
    expect(normalizeParameter({ name: 'rest', kind: ParameterKind.VARIADIC })).toEqual({
      name: 'rest',
      kind: ParameterKind.VARIADIC,
    });
    expect(getParameterNames(add)).toEqual(['a', 'b']);
  });

  it('should freeze defined operations', () => {
    expect(Object.isFrozen(add)).toBe(true);
    expect(Object.isFrozen(add.parameters)).toBe(true);
    expect(add.invoke({ a: 2, b: 3 })).toBe(5);
  });

  describe('OperationRegistry', () => {
    it('should register and look up operations by name', () => {
      const registry = new OperationRegistry([add]);

      expect(registry.has('add')).toBe(true);
      expect(registry.get('add')).toBe(add);
      expect(registry.names()).toEqual(['add']);
      expect(registry.list()).toEqual([add]);
    });

    it('should reject duplicate registrations', () => {
      const registry = new OperationRegistry([add]);

      expect(() => registry.register(add)).toThrow(OperationRegistryError);
      expect(() => registry.register(add)).toThrow('Operation "add" is already registered.');
    });

    it('should fail for unknown operations', () => {
      const registry = new OperationRegistry([add]);

      expect(() => registry.get('mul')).toThrow('Operation "mul" is not registered, expected one of ["add"].');
    });
  });
});
