import { ValidationException } from '../exceptions';
import { Role } from './role.vo';

/**
 * Who produced the message a vocabulary item was found in.
 */
export type VocabularyOrigin = 'learner' | 'tutor';

export function vocabularyOriginFromRole(role: Role): VocabularyOrigin {
  return role.isUser() ? 'learner' : 'tutor';
}

export function parseVocabularyOrigin(origin: string): VocabularyOrigin {
  if (origin === 'learner' || origin === 'tutor') {
    return origin;
  }
  throw new ValidationException('VocabularyOrigin', `"${origin}" is not valid`);
}
