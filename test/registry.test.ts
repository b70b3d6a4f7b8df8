import { describe, it, expect, beforeEach } from 'vitest';
import { UnitRegistry } from '../src/orchestrator/registry.js';
import { UnitNotFoundError } from '../src/orchestrator/errors.js';

describe('UnitRegistry', () => {
  let registry: UnitRegistry;

  beforeEach(() => {
    registry = new UnitRegistry();
  });

  it('should register units with dependencies in insertion order', () => {
    registry.register('b', () => 'b', ['a']);
    registry.register('a', () => 'a');

    expect(registry.names()).toEqual(['b', 'a']);
    expect(registry.size).toBe(2);
    expect(registry.dependenciesOf('b')).toEqual(['a']);
    expect(registry.dependenciesOf('a')).toEqual([]);
  });

  it('should accept dependencies that are not registered yet', () => {
    registry.register('a', () => 1, ['later']);

    expect(registry.has('a')).toBe(true);
    expect(registry.has('later')).toBe(false);
  });

  it('should replace an entry on re-registration and keep its position', () => {
    const first = (): string => 'first';
    const second = (): string => 'second';

    registry.register('a', first, ['b']);
    registry.register('b', () => 'b');
    registry.register('a', second);

    expect(registry.names()).toEqual(['a', 'b']);
    expect(registry.get('a')?.handler).toBe(second);
    expect(registry.get('a')?.dependencies).toEqual([]);
  });

  it('should copy the dependency list', () => {
    const deps = ['x'];
    registry.register('a', () => 1, deps);
    deps.push('y');

    expect(registry.dependenciesOf('a')).toEqual(['x']);
  });

  it('should return undefined from get() for unknown names', () => {
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.dependenciesOf('missing')).toEqual([]);
  });

  it('should throw UnitNotFoundError from require() for unknown names', () => {
    expect(() => registry.require('missing')).toThrow(UnitNotFoundError);
    expect(() => registry.require('missing')).toThrow('Unit missing not found');
  });
});
