import { describe, expect, it } from 'vitest';
import { ArgumentError, DiffError, TypeMismatchError, formatPath, withSegment } from '../errors.js';

describe('errors', () => {
  it('carry a code and their class name', () => {
    const error = new ArgumentError('bad ids');

    expect(error).toBeInstanceOf(DiffError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('ARGUMENT_ERROR');
    expect(error.name).toBe('ArgumentError');
    expect(new TypeMismatchError('number', 'string').code).toBe('TYPE_MISMATCH');
  });

  it('describe mismatches between types and within one type', () => {
    expect(new TypeMismatchError('number', 'string').message).toBe('Cannot diff number against string');
    expect(new TypeMismatchError('boolean', 'boolean', ['flag']).message).toBe(
      'Values of type boolean cannot be subtracted or diffed at flag',
    );
  });

  it('withSegment prepends to the path of a mismatch', () => {
    let caught: unknown;
    try {
      withSegment('outer', () =>
        withSegment(2, () => {
          throw new TypeMismatchError('string', 'number');
        }),
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(TypeMismatchError);
    if (caught instanceof TypeMismatchError) {
      expect(caught.path).toEqual(['outer', 2]);
      expect(caught.message).toBe('Cannot diff string against number at outer[2]');
    }
  });

  it('withSegment passes other errors through untouched', () => {
    const error = new ArgumentError('nope');

    expect(() =>
      withSegment('x', () => {
        throw error;
      }),
    ).toThrow(error);
    expect(withSegment('x', () => 42)).toBe(42);
  });

  it('formatPath writes an accessor chain', () => {
    expect(formatPath(['settings', 'limits', 3])).toBe('settings.limits[3]');
    expect(formatPath([['r1', 'c2'], 'value'])).toBe('[r1, c2].value');
    expect(formatPath([])).toBe('');
  });
});
