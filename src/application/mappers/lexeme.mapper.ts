import {
  Language,
  Lemma,
  Lexeme,
  Morphology,
  parsePartOfSpeech,
} from '@domain/value-objects';
import { LexemeInputDto, MorphologyInputDto } from '@application/dtos';

export class LexemeMapper {
  /**
   * Builds a validated Lexeme from caller input. Throws ValidationException on bad tags.
   */
  static toDomain(input: LexemeInputDto): Lexeme {
    const lemma = Lemma.create(
      input.lemma,
      parsePartOfSpeech(input.partOfSpeech),
      Language.fromCode(input.language),
    );
    return Lexeme.create(input.surfaceForm, lemma, Morphology.create(input.morphology ?? {}));
  }

  static morphologyToDto(morphology: Morphology): MorphologyInputDto {
    return {
      ...(morphology.gender && { gender: morphology.gender }),
      ...(morphology.number && { number: morphology.number }),
      ...(morphology.tense && { tense: morphology.tense }),
      ...(morphology.person && { person: morphology.person }),
    };
  }
}
