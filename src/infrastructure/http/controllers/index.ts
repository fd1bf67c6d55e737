export { UsersController } from './users.controller';
export { ConversationController } from './conversation.controller';
export { VocabularyController } from './vocabulary.controller';
export { HealthController } from './health.controller';
