import { ValidationException } from '../../exceptions';

export const PARTS_OF_SPEECH = [
  'noun',
  'verb',
  'adjective',
  'adverb',
  'pronoun',
  'preposition',
  'conjunction',
  'determiner',
  'interjection',
  'numeral',
  'phrase',
  'idiom',
  'unknown',
] as const;

export type PartOfSpeech = (typeof PARTS_OF_SPEECH)[number];

export function parsePartOfSpeech(value: string): PartOfSpeech {
  const normalized = value.toLowerCase().trim();
  const parsed = PARTS_OF_SPEECH.find((candidate) => candidate === normalized);
  if (!parsed) {
    throw new ValidationException('PartOfSpeech', `"${value}" is not a known part of speech`);
  }
  return parsed;
}
