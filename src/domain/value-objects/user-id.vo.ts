import { EntityId } from './entity-id.vo';

// Learner identifier
export class UserId extends EntityId {
  readonly kind = 'UserId';

  private constructor(value: string) {
    super(value, 'UserId');
  }

  static fromString(id: string): UserId {
    return new UserId(id.trim());
  }

  static generate(): UserId {
    return new UserId(EntityId.newValue('usr'));
  }
}
