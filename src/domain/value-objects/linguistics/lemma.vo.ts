import { ValidationException } from '../../exceptions';
import { Language } from '../language.vo';
import { PartOfSpeech } from './part-of-speech.vo';

/**
 * Canonical dictionary form of a word, scoped to a language.
 * The same spelling in two languages, or as two parts of speech, is two lemmas.
 */
export class Lemma {
  private constructor(
    public readonly term: string,
    public readonly partOfSpeech: PartOfSpeech,
    public readonly language: Language,
  ) {
    this.validate();
  }

  static create(term: string, partOfSpeech: PartOfSpeech, language: Language): Lemma {
    return new Lemma(term.trim().toLowerCase(), partOfSpeech, language);
  }

  private validate(): void {
    if (this.term.length === 0) {
      throw new ValidationException('Lemma', 'term cannot be empty');
    }
  }

  equals(other: Lemma): boolean {
    return (
      this.term === other.term &&
      this.partOfSpeech === other.partOfSpeech &&
      this.language.equals(other.language)
    );
  }

  toString(): string {
    return `${this.term} (${this.partOfSpeech}, ${this.language.code})`;
  }
}
