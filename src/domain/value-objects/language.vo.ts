import isoLanguageNames from './data/iso-639-1.json';
import { ValidationException } from '../exceptions';

/**
 * Value Object representing a language by its ISO 639-1 two-letter code.
 * Codes outside the ISO 639-1 table are rejected.
 */
export class Language {
  private static readonly NAMES: Readonly<Record<string, string>> = isoLanguageNames;

  private constructor(public readonly code: string) {
    this.validate();
  }

  static fromCode(code: string): Language {
    return new Language(code.toLowerCase().trim());
  }

  static isSupported(code: string): boolean {
    return Object.prototype.hasOwnProperty.call(Language.NAMES, code.toLowerCase().trim());
  }

  private validate(): void {
    if (!/^[a-z]{2}$/.test(this.code)) {
      throw new ValidationException('Language', `"${this.code}" is not a two-letter code`);
    }
    if (!Language.isSupported(this.code)) {
      throw new ValidationException('Language', `"${this.code}" is not an ISO 639-1 code`);
    }
  }

  // English name, e.g. "es" -> "Spanish"
  get name(): string {
    return Language.NAMES[this.code];
  }

  equals(other: Language): boolean {
    return this.code === other.code;
  }

  toString(): string {
    return this.code;
  }
}
