import { Tool } from '@anthropic-ai/sdk/resources/messages';
import { z } from 'zod';
import { GENDERS, GRAMMATICAL_NUMBERS, PARTS_OF_SPEECH, TENSES } from '@domain/value-objects';

/**
 * Tool the tutor is forced to call when extracting vocabulary, so the
 * lexemes come back as structured input instead of free text.
 */
export const RECORD_VOCABULARY_TOOL: Tool = {
  name: 'record_vocabulary',
  description: 'Record the lexemes found in a text, one entry per distinct word form.',
  input_schema: {
    type: 'object' as const,
    properties: {
      lexemes: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            surfaceForm: {
              type: 'string',
              description: 'The word exactly as written in the text (e.g. "casas")',
            },
            lemma: {
              type: 'string',
              description: 'Dictionary form of the word (e.g. "casa")',
            },
            partOfSpeech: { type: 'string', enum: [...PARTS_OF_SPEECH] },
            morphology: {
              type: 'object',
              properties: {
                gender: { type: 'string', enum: [...GENDERS] },
                number: { type: 'string', enum: [...GRAMMATICAL_NUMBERS] },
                tense: { type: 'string', enum: [...TENSES] },
                person: { type: 'integer', enum: [1, 2, 3] },
              },
            },
          },
          required: ['surfaceForm', 'lemma', 'partOfSpeech'],
        },
      },
    },
    required: ['lexemes'],
  },
};

export const recordVocabularyInputSchema = z.object({
  lexemes: z.array(z.unknown()),
});

// Validated one by one so a single malformed entry does not discard the rest
export const extractedLexemeSchema = z.object({
  surfaceForm: z.string().min(1),
  lemma: z.string().min(1),
  partOfSpeech: z.string(),
  morphology: z
    .object({
      gender: z.string().optional(),
      number: z.string().optional(),
      tense: z.string().optional(),
      person: z.number().int().optional(),
    })
    .optional(),
});

export type ExtractedLexeme = z.infer<typeof extractedLexemeSchema>;
