import { describe, it, expect } from 'vitest';
import { deepFreeze } from './freeze.js';

describe('deepFreeze', () => {
  it('should freeze nested objects and arrays', () => {
    const value = deepFreeze({ name: 'stations', formats: ['GeoJSON'], nested: { properties: ['id'] } });

    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.formats)).toBe(true);
    expect(Object.isFrozen(value.nested.properties)).toBe(true);
  });

  it('should reject writes', () => {
    const value = deepFreeze({ list: ['a'] });

    expect(Reflect.set(value.list, 0, 'b')).toBe(false);
    expect(value.list).toEqual(['a']);
  });
});
