import { User } from '@domain/entities';
import { CEFRLevel, Language, LanguagePair, UserId } from '@domain/value-objects';
import { ProficiencyDocument, UserDocument } from '../schemas';

/**
 * Mapper for converting between the User entity and its MongoDB document.
 * The document's `version` is owned by the repository, not by this mapper.
 */
export class UserMapper {
  static toDomain(document: UserDocument): User {
    return User.reconstitute({
      id: UserId.fromString(document._id),
      languages: LanguagePair.fromCodes(document.nativeLanguage, document.targetLanguage),
      proficiencies: document.proficiencies.map((proficiency) => ({
        language: Language.fromCode(proficiency.language),
        level: CEFRLevel.fromString(proficiency.level),
      })),
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }

  static toDocument(user: User): UserDocument {
    const document = new UserDocument();
    document._id = user.id.toString();
    document.nativeLanguage = user.nativeLanguage.code;
    document.targetLanguage = user.targetLanguage.code;
    document.proficiencies = user.proficiencies.map((proficiency) => {
      const sub = new ProficiencyDocument();
      sub.language = proficiency.language.code;
      sub.level = proficiency.level.value;
      return sub;
    });
    document.createdAt = user.createdAt;
    document.updatedAt = user.updatedAt;
    return document;
  }
}
