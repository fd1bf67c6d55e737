import { Language, Lexeme, TutorProfile } from '@domain/value-objects';
import { TutorContextDto } from '@application/dtos';

/**
 * Capabilities the application needs from an AI tutor.
 *
 * Implementations reject with ProviderError when the provider answers with
 * an error, PortTimeoutError when it does not answer in time, and
 * PortUnavailableError when it cannot be reached or is not configured.
 */
export interface IAITutorPort {
  /**
   * Produces the tutor's next message for the conversation.
   *
   * @param context - Recent messages plus who the learner is
   * @param profile - How the tutor should answer
   * @returns the reply text
   */
  generateReply(context: TutorContextDto, profile: TutorProfile): Promise<string>;

  /**
   * Finds the vocabulary worth learning in a piece of text.
   *
   * @param text - Text to analyse
   * @param language - Language the lexemes belong to
   */
  extractVocabulary(text: string, language: Language): Promise<Lexeme[]>;
}
