import {
  Language,
  Lemma,
  Lexeme,
  Morphology,
  parsePartOfSpeech,
  parseReviewOutcome,
} from '@domain/value-objects';
import { ValidationException } from '@domain/exceptions';

describe('Linguistics', () => {
  const spanish = Language.fromCode('es');

  describe('Morphology', () => {
    it('should parse and normalize tags', () => {
      const morphology = Morphology.create({ gender: 'Feminine', number: 'plural', person: '3' });

      expect(morphology.gender).toBe('feminine');
      expect(morphology.number).toBe('plural');
      expect(morphology.person).toBe(3);
      expect(morphology.tense).toBeUndefined();
    });

    it('should treat null tags as absent', () => {
      expect(Morphology.create({ gender: null, tense: null }).isEmpty()).toBe(true);
    });

    it('should reject unknown tags', () => {
      expect(() => Morphology.create({ gender: 'common' })).toThrow(
        'Invalid Morphology: gender "common" is not valid',
      );
      expect(() => Morphology.create({ person: 4 })).toThrow(ValidationException);
    });

    it('should build a canonical key independent of input order', () => {
      const morphology = Morphology.create({ tense: 'past', person: 1, number: 'singular' });

      expect(morphology.key).toBe('number=singular;person=1;tense=past');
      expect(Morphology.empty().key).toBe('');
    });
  });

  describe('Lemma', () => {
    it('should normalize the term', () => {
      const lemma = Lemma.create('  Casa ', 'noun', spanish);

      expect(lemma.term).toBe('casa');
      expect(lemma.toString()).toBe('casa (noun, es)');
    });

    it('should reject an empty term', () => {
      expect(() => Lemma.create('  ', 'noun', spanish)).toThrow(ValidationException);
    });

    it('should distinguish languages and parts of speech', () => {
      const noun = Lemma.create('bajo', 'noun', spanish);

      expect(noun.equals(Lemma.create('bajo', 'adjective', spanish))).toBe(false);
      expect(noun.equals(Lemma.create('bajo', 'noun', Language.fromCode('it')))).toBe(false);
      expect(noun.equals(Lemma.create('Bajo', 'noun', spanish))).toBe(true);
    });
  });

  describe('Lexeme', () => {
    it('should derive its key from lemma, surface form and morphology', () => {
      const lexeme = Lexeme.create(
        'Casas',
        Lemma.create('casa', 'noun', spanish),
        Morphology.create({ gender: 'feminine', number: 'plural' }),
      );

      expect(lexeme.key).toBe('es:casa:noun:casas:gender=feminine;number=plural');
      expect(lexeme.surfaceForm).toBe('Casas');
      expect(lexeme.language.code).toBe('es');
    });

    it('should default to an empty morphology', () => {
      const lexeme = Lexeme.create('hola', Lemma.create('hola', 'interjection', spanish));

      expect(lexeme.morphology.isEmpty()).toBe(true);
      expect(lexeme.key).toBe('es:hola:interjection:hola:');
    });

    it('should reject an empty surface form', () => {
      expect(() => Lexeme.create(' ', Lemma.create('casa', 'noun', spanish))).toThrow(
        'Invalid Lexeme: surface form cannot be empty',
      );
    });
  });

  describe('parsers', () => {
    it('should parse parts of speech', () => {
      expect(parsePartOfSpeech('Verb')).toBe('verb');
      expect(() => parsePartOfSpeech('gerund')).toThrow(ValidationException);
    });

    it('should parse review outcomes', () => {
      expect(parseReviewOutcome(' CORRECT ')).toBe('correct');
      expect(() => parseReviewOutcome('maybe')).toThrow(ValidationException);
    });
  });
});
