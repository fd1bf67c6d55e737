import { ValidationException } from '../exceptions';
import { Language } from './language.vo';

/**
 * The learner's native language and the language being learned.
 * Both are required and must differ.
 */
export class LanguagePair {
  private constructor(
    public readonly native: Language,
    public readonly target: Language,
  ) {
    this.validate();
  }

  static of(native: Language, target: Language): LanguagePair {
    return new LanguagePair(native, target);
  }

  static fromCodes(nativeCode: string, targetCode: string): LanguagePair {
    return new LanguagePair(Language.fromCode(nativeCode), Language.fromCode(targetCode));
  }

  private validate(): void {
    if (this.native.equals(this.target)) {
      throw new ValidationException(
        'LanguagePair',
        `native and target language must differ (both "${this.native.code}")`,
      );
    }
  }

  equals(other: LanguagePair): boolean {
    return this.native.equals(other.native) && this.target.equals(other.target);
  }

  toString(): string {
    return `${this.native.code}->${this.target.code}`;
  }
}
