import { Language, LanguagePair } from '@domain/value-objects';
import { ValidationException } from '@domain/exceptions';

describe('Language', () => {
  it('should create a language from an ISO 639-1 code', () => {
    const language = Language.fromCode('es');

    expect(language.code).toBe('es');
    expect(language.name).toBe('Spanish');
  });

  it('should normalize case and whitespace', () => {
    expect(Language.fromCode(' FR ').code).toBe('fr');
  });

  it('should reject codes that are not two letters', () => {
    expect(() => Language.fromCode('eng')).toThrow(ValidationException);
    expect(() => Language.fromCode('')).toThrow(ValidationException);
  });

  it('should reject two-letter codes outside the ISO table', () => {
    expect(() => Language.fromCode('xx')).toThrow('Invalid Language: "xx" is not an ISO 639-1 code');
  });

  it('should report whether a code is supported', () => {
    expect(Language.isSupported('de')).toBe(true);
    expect(Language.isSupported('zz')).toBe(false);
  });

  it('should compare by code', () => {
    expect(Language.fromCode('en').equals(Language.fromCode('EN'))).toBe(true);
    expect(Language.fromCode('en').equals(Language.fromCode('es'))).toBe(false);
  });
});

describe('LanguagePair', () => {
  it('should hold native and target languages', () => {
    const pair = LanguagePair.fromCodes('en', 'es');

    expect(pair.native.code).toBe('en');
    expect(pair.target.code).toBe('es');
    expect(pair.toString()).toBe('en->es');
  });

  it('should reject identical native and target languages', () => {
    expect(() => LanguagePair.fromCodes('en', 'EN')).toThrow(
      'Invalid LanguagePair: native and target language must differ (both "en")',
    );
  });

  it('should treat direction as significant', () => {
    expect(LanguagePair.fromCodes('en', 'es').equals(LanguagePair.fromCodes('es', 'en'))).toBe(
      false,
    );
  });
});
