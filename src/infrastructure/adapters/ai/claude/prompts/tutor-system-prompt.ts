/**
 * System prompt for the language tutor.
 *
 * The learner writes in the target language; the tutor answers in it too,
 * at a level the learner can follow, and falls back to the native language
 * only to explain a mistake.
 */

export interface TutorPromptContext {
  nativeLanguage: string;
  targetLanguage: string;
  learnerLevel: string;
  learnerLevelDescription: string;
  // TutorProfile.toInstructions()
  profileInstructions: string;
  // Instructions carried by system messages of the conversation
  conversationNotes?: string[];
}

export function buildTutorSystemPrompt(context: TutorPromptContext): string {
  const notesSection = context.conversationNotes?.length
    ? `
## Notes for this conversation
${context.conversationNotes.map((note) => `- ${note}`).join('\n')}
`
    : '';

  return `You are a patient, encouraging language tutor. The learner is a native ${context.nativeLanguage} speaker learning ${context.targetLanguage}.

## The learner
- Level: ${context.learnerLevel} (${context.learnerLevelDescription}) on the CEFR scale
- Keep vocabulary and grammar within reach of that level, stretching it only slightly

## How to help
1. Reply in ${context.targetLanguage}.
2. When the learner makes a mistake, give the corrected sentence, then a short explanation in ${context.nativeLanguage}.
3. Keep the conversation going: end with a question or a prompt for the learner.
4. Introduce at most a few new words per reply and use them in context.
5. Never switch entirely to ${context.nativeLanguage}, even if the learner does.

${context.profileInstructions}
${notesSection}`;
}

export const VOCABULARY_EXTRACTION_PROMPT = (language: string, text: string): string =>
  `List the words in the following ${language} text that a learner should study.
Record each one with the record_vocabulary tool: the form exactly as it appears in the text,
its dictionary form (lemma), its part of speech and, where it applies, its gender, number, tense and person.
Skip names, numbers and punctuation.

Text:
"""
${text}
"""`;
