import { deepFreeze } from './deep-freeze';

describe('deepFreeze', () => {
  it('should freeze nested objects and arrays', () => {
    const value = deepFreeze({ list: [{ score: 1 }], nested: { flag: true } });

    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.list)).toBe(true);
    expect(Object.isFrozen(value.list[0])).toBe(true);
    expect(Object.isFrozen(value.nested)).toBe(true);
  });
});
