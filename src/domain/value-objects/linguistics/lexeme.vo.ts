import { ValidationException } from '../../exceptions';
import { Language } from '../language.vo';
import { Lemma } from './lemma.vo';
import { Morphology } from './morphology.vo';

/**
 * A concrete word form as it appeared in text: surface form, its lemma
 * and morphological tags. "casas" is a lexeme of the lemma "casa".
 */
export class Lexeme {
  private constructor(
    public readonly surfaceForm: string,
    public readonly lemma: Lemma,
    public readonly morphology: Morphology,
  ) {
    this.validate();
  }

  static create(surfaceForm: string, lemma: Lemma, morphology?: Morphology): Lexeme {
    return new Lexeme(surfaceForm.trim(), lemma, morphology ?? Morphology.empty());
  }

  private validate(): void {
    if (this.surfaceForm.length === 0) {
      throw new ValidationException('Lexeme', 'surface form cannot be empty');
    }
  }

  get language(): Language {
    return this.lemma.language;
  }

  /**
   * Identity of the lexeme: two lexemes with the same key are the same
   * vocabulary entry for a learner.
   */
  get key(): string {
    return [
      this.lemma.language.code,
      this.lemma.term,
      this.lemma.partOfSpeech,
      this.surfaceForm.toLowerCase(),
      this.morphology.key,
    ].join(':');
  }

  equals(other: Lexeme): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return `${this.surfaceForm} <${this.lemma.toString()}>`;
  }
}
