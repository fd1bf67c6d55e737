import { randomUUID } from 'crypto';
import { ValidationException } from '../exceptions';

/**
 * Base for the string identifiers of entities. Generated ids carry a short
 * type prefix (`usr_`, `conv_`, ...) so they are recognisable in logs.
 */
export abstract class EntityId {
  protected constructor(
    public readonly value: string,
    kind: string,
  ) {
    if (value.length === 0) {
      throw new ValidationException(kind, 'cannot be empty');
    }
  }

  protected static newValue(prefix: string): string {
    return `${prefix}_${randomUUID()}`;
  }

  // Ids of different entity types never compare equal
  equals(other: EntityId): boolean {
    return this.constructor === other.constructor && this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
