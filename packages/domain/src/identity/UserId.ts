import { NumericId } from '../shared/vos/NumericId';

/**
 * Value object representing a site user's identifier.
 */
export class UserId extends NumericId {
  private constructor(value: number) {
    super(value, 'UserId');
  }

  static from(value: number): UserId {
    return new UserId(value);
  }
}
