// @filename: error.ts
/**
 * Error types for enumerations.
 *
 * Exhaustion is not an error (see `signal.ts`). What lands here are genuine
 * programmer mistakes: a negative count handed to `take`, a `cycle` over an
 * empty sequence, a callback that blew up halfway through a pull.
 *
 * @module
 */

/**
 * Represents an error raised by an enumeration or one of its operators,
 * with the ability to aggregate the underlying errors.
 *
 * This class extends AggregateError so that a failure deep inside a pipeline
 * keeps the original error objects while adding context about where it
 * happened:
 * - which operator raised or observed it
 * - the offending value, when there is one
 * - a short tip on how to fix the call
 */
export class EnumError extends AggregateError {
  /** The operator where the error occurred */
  readonly operator?: string;

  /** The value that triggered the error */
  readonly value?: unknown;

  /** Helpful potential fix */
  readonly tip?: string;

  /**
   * Creates a new EnumError.
   *
   * @param errors - The error(s) that caused this error
   * @param message - The error message
   * @param options - Additional error context
   */
  constructor(
    errors: unknown,
    message: string,
    options?: {
      operator?: string;
      value?: unknown;
      cause?: unknown;
      tip?: string;
    }
  ) {
    const errorArray: unknown[] = Array.isArray(errors) ? errors : [errors];
    const normalizedErrors = errorArray.map(err =>
      err instanceof Error ? err : new Error(String(err))
    );

    super(normalizedErrors, message, { cause: options?.cause });
    this.name = 'EnumError';
    this.operator = options?.operator;
    this.value = options?.value;
    this.tip = options?.tip;
  }

  /**
   * Returns a string representation of the error including the operator
   * and value context if available.
   */
  override toString(): string {
    let result = `${this.name}: ${this.message}`;

    if (this.operator) {
      result += `\n  in operator: ${this.operator}`;
    }

    if (this.value !== undefined) {
      const valueStr = typeof this.value === 'object'
        ? JSON.stringify(this.value).slice(0, 100) // Truncate long objects
        : String(this.value);

      result += `\n  offending value: ${valueStr}`;
    }

    if (this.errors.length > 0) {
      result += '\n  with errors:';
      this.errors.forEach((err, i) => {
        result += `\n    ${i + 1}) ${err}`;
      });
    }

    if (this.tip) {
      result += `\n  tip: ${this.tip}`;
    }

    return result;
  }

  /**
   * Creates an EnumError from anything thrown while an operator was running.
   * An EnumError that already names its operator is returned as is, so an
   * error bubbling up through several stages keeps the innermost context.
   *
   * @param error - The original error
   * @param operator - The operator name
   * @param value - The value being processed
   */
  static from(
    error: unknown,
    operator?: string,
    value?: unknown,
  ): EnumError {
    if (error instanceof EnumError) {
      if (!error.operator && operator) {
        return new EnumError(
          error.errors,
          error.message,
          {
            operator,
            value: error.value ?? value,
            cause: error.cause,
            tip: error.tip
          }
        );
      }
      return error;
    }

    return new EnumError(
      error,
      error instanceof Error ? error.message : String(error),
      { operator, value, cause: error }
    );
  }
}

/**
 * Thrown by `nextOrThrow` when the generator has nothing left. Regular pulls
 * never throw this; they return `DONE`.
 */
export class ExhaustedError extends EnumError {
  constructor(operator = 'nextOrThrow') {
    super(
      new RangeError('generator is exhausted'),
      'Cannot take the next element of an exhausted generator',
      {
        operator,
        tip: 'Use gen.next() and check `done` when the end of the sequence is expected.'
      }
    );
    this.name = 'ExhaustedError';
  }
}

/**
 * Checks if a value is an EnumError without throwing.
 *
 * @example
 * ```ts
 * try {
 *   toList(pipe(source, map(parse)));
 * } catch (err) {
 *   if (isEnumError(err)) console.error(err.operator, err.errors);
 * }
 * ```
 */
export function isEnumError(value: unknown): value is EnumError {
  return value instanceof EnumError;
}
