import { EntityId } from './entity-id.vo';

// One per learner and distinct lexeme
export class VocabularyItemId extends EntityId {
  readonly kind = 'VocabularyItemId';

  private constructor(value: string) {
    super(value, 'VocabularyItemId');
  }

  static fromString(id: string): VocabularyItemId {
    return new VocabularyItemId(id.trim());
  }

  static generate(): VocabularyItemId {
    return new VocabularyItemId(EntityId.newValue('voc'));
  }
}
