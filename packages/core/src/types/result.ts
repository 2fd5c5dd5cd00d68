/**
 * Result<T, E> for recoverable per-call failures (decode, shape checks).
 * Configuration errors are thrown instead: they fail construction, not a call.
 */

export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Success variant of Result<T, E>
 */
export class Ok<T> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T> {
    return true;
  }

  isErr(): this is never {
    return false;
  }

  map<U>(fn: (value: T) => U): Ok<U> {
    return new Ok(fn(this.value));
  }

  flatMap<U, F>(fn: (value: T) => Result<U, F>): Result<U, F> {
    return fn(this.value);
  }

  /**
   * Get the value or throw the error
   * Use sparingly - prefer narrowing with isOk/isErr
   */
  unwrap(): T {
    return this.value;
  }

  unwrapOr(_defaultValue: T): T {
    return this.value;
  }
}

/**
 * Error variant of Result<T, E>
 */
export class Err<E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isOk(): this is never {
    return false;
  }

  isErr(): this is Err<E> {
    return true;
  }

  map<U>(_fn: (value: never) => U): Err<E> {
    return this;
  }

  flatMap<U, F>(_fn: (value: never) => Result<U, F>): Err<E> {
    return this;
  }

  unwrap(): never {
    if (this.error instanceof Error) {
      throw this.error;
    }
    throw new Error(`Called unwrap on an Err value: ${String(this.error)}`);
  }

  unwrapOr<T>(defaultValue: T): T {
    return defaultValue;
  }
}

export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.isOk();
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.isErr();
}

/**
 * Map each item through `fn`, stopping at the first Err
 */
export function collectResults<I, T, E>(
  items: readonly I[],
  fn: (item: I, index: number) => Result<T, E>
): Result<T[], E> {
  const out: T[] = [];
  for (const [index, item] of items.entries()) {
    const result = fn(item, index);
    if (isErr(result)) {
      return result;
    }
    out.push(result.value);
  }
  return ok(out);
}

/**
 * Transform the success value, passing an Err through untouched
 */
export function mapResult<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> {
  return isErr(result) ? result : ok(fn(result.value));
}
