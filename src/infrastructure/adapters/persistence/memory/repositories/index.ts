export { MemoryUserRepository } from './memory-user.repository';
export { MemoryConversationRepository } from './memory-conversation.repository';
export { MemoryVocabularyRepository } from './memory-vocabulary.repository';
