/**
 * Result<T, E> type for functional error handling.
 * Every decode/encode entry point returns one of these instead of throwing;
 * the first failure short-circuits the whole call.
 *
 *   const decoded = decode(payload, Person);
 *   if (decoded.isErr()) return decoded;
 *   use(decoded.value);
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

  /**
   * Get the value or throw.
   * Use at boundaries that report by exception (the CLI); prefer narrowing
   * with isOk/isErr elsewhere
   */
  unwrap(): T {
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

  unwrap(): never {
    if (this.error instanceof Error) {
      throw this.error;
    }
    throw new Error(`Called unwrap on an Err value: ${String(this.error)}`);
  }
}

export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}
