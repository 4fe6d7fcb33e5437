/**
 * Fluent assertion DSL for domain invariants.
 *
 * @example
 * ```typescript
 * Assert.that(userName, 'UserName').isNonEmpty();
 * Assert.that(frames, 'Frames').isInteger().isGreaterThanOrEqual(0);
 * ```
 */
export class Assert<T> {
  private constructor(
    private readonly value: T,
    private readonly name?: string
  ) {}

  static that<T>(value: T, name?: string): Assert<T> {
    return new Assert(value, name);
  }

  isNonEmpty(): this {
    if (typeof this.value !== 'string' || this.value.trim().length === 0) {
      throw new Error(this.formatError('must be a non-empty string'));
    }
    return this;
  }

  isInteger(): this {
    if (typeof this.value !== 'number' || !Number.isInteger(this.value)) {
      throw new Error(this.formatError('must be an integer'));
    }
    return this;
  }

  isGreaterThan(min: number): this {
    if (typeof this.value !== 'number' || this.value <= min) {
      throw new Error(this.formatError(`must be greater than ${min}`));
    }
    return this;
  }

  isGreaterThanOrEqual(min: number): this {
    if (typeof this.value !== 'number' || this.value < min) {
      throw new Error(
        this.formatError(`must be greater than or equal to ${min}`)
      );
    }
    return this;
  }

  isOneOf(allowed: readonly T[]): this {
    if (!allowed.includes(this.value)) {
      throw new Error(this.formatError(`must be one of [${allowed.join(', ')}]`));
    }
    return this;
  }

  doesNotEqual(other: T): this {
    if (this.value === other) {
      throw new Error(this.formatError(`must not equal ${String(other)}`));
    }
    return this;
  }

  satisfies(predicate: (value: T) => boolean, errorMessage?: string): this {
    if (!predicate(this.value)) {
      throw new Error(this.formatError(errorMessage ?? 'must satisfy predicate'));
    }
    return this;
  }

  private formatError(message: string): string {
    const prefix = this.name ? `${this.name} ` : 'Value ';
    const value = this.value;
    const valueStr =
      value === undefined
        ? 'undefined'
        : value === null
          ? 'null'
          : JSON.stringify(value);
    return `${prefix}${message}, got: ${valueStr}`;
  }
}
