export { IUserRepositoryPort, IUserReaderPort } from './user-repository.port';
export {
  IConversationRepositoryPort,
  IConversationReaderPort,
} from './conversation-repository.port';
export { IVocabularyRepositoryPort, IVocabularyReaderPort } from './vocabulary-repository.port';
export { IAITutorPort } from './ai-tutor.port';
export { IClockPort } from './clock.port';
