import { Assert } from '../Assert';

/**
 * Base class for database-assigned identifiers.
 *
 * Identifiers are positive integers; subclasses exist so that a
 * submission id can never be passed where a publication id is expected.
 */
export abstract class NumericId {
  protected constructor(
    private readonly value: number,
    name: string
  ) {
    Assert.that(value, name).isInteger().isGreaterThan(0);
  }

  unwrap(): number {
    return this.value;
  }

  equals(other: NumericId): boolean {
    return this.constructor === other.constructor && this.value === other.value;
  }

  toString(): string {
    return String(this.value);
  }
}
