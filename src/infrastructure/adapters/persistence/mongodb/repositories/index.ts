export { MongoUserRepository } from './mongo-user.repository';
export { MongoConversationRepository } from './mongo-conversation.repository';
export { MongoVocabularyRepository } from './mongo-vocabulary.repository';
