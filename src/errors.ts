/**
 * Diff Errors
 *
 * Every failure the engine reports is a caller contract violation, raised
 * synchronously before any difference value is built.
 */

export type DiffErrorCode = 'ARGUMENT_ERROR' | 'TYPE_MISMATCH';

/** A step on the way to a nested value: a field name, key or identifier. */
export type PathSegment = unknown;

export class DiffError extends Error {
  readonly code: DiffErrorCode;

  constructor(code: DiffErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed identifier arguments, or two values that cannot be diffed
 * against each other at all.
 */
export class ArgumentError extends DiffError {
  constructor(message: string) {
    super('ARGUMENT_ERROR', message);
  }
}

/**
 * A value present on both sides whose types allow neither subtraction nor a
 * recursive diff.
 */
export class TypeMismatchError extends DiffError {
  readonly oldType: string;
  readonly newType: string;
  readonly path: readonly PathSegment[];

  constructor(oldType: string, newType: string, path: readonly PathSegment[] = []) {
    super('TYPE_MISMATCH', describeMismatch(oldType, newType, path));
    this.oldType = oldType;
    this.newType = newType;
    this.path = path;
  }

  /** The same mismatch, seen one level further out. */
  within(segment: PathSegment): TypeMismatchError {
    return new TypeMismatchError(this.oldType, this.newType, [segment, ...this.path]);
  }
}

/**
 * Run `fn`, re-raising a type mismatch with `segment` prepended to its path.
 */
export function withSegment<R>(segment: PathSegment, fn: () => R): R {
  try {
    return fn();
  } catch (error) {
    if (error instanceof TypeMismatchError) {
      throw error.within(segment);
    }
    throw error;
  }
}

/**
 * Render a path the way it would be written as an accessor chain,
 * e.g. `settings.limits[3]`.
 */
export function formatPath(path: readonly PathSegment[]): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'string') {
      out += out ? `.${segment}` : segment;
    } else if (Array.isArray(segment)) {
      out += `[${segment.map((part) => String(part)).join(', ')}]`;
    } else {
      out += `[${String(segment)}]`;
    }
  }
  return out;
}

function describeMismatch(oldType: string, newType: string, path: readonly PathSegment[]): string {
  const where = path.length > 0 ? ` at ${formatPath(path)}` : '';
  if (oldType === newType) {
    return `Values of type ${oldType} cannot be subtracted or diffed${where}`;
  }
  return `Cannot diff ${oldType} against ${newType}${where}`;
}
