export { PARTS_OF_SPEECH, PartOfSpeech, parsePartOfSpeech } from './part-of-speech.vo';
export {
  GENDERS,
  GRAMMATICAL_NUMBERS,
  TENSES,
  PERSONS,
  Gender,
  GrammaticalNumber,
  Tense,
  Person,
  Morphology,
  MorphologyProps,
} from './morphology.vo';
export { Lemma } from './lemma.vo';
export { Lexeme } from './lexeme.vo';
