// Module
export { MongoDBModule } from './mongodb.module';

// Repositories
export {
  MongoUserRepository,
  MongoConversationRepository,
  MongoVocabularyRepository,
} from './repositories';

// Schemas
export * from './schemas';

// Mappers
export { UserMapper, ConversationMapper, VocabularyItemMapper } from './mappers';
