export { UserMapper } from './user.mapper';
export { ConversationMapper } from './conversation.mapper';
export { VocabularyItemMapper } from './vocabulary-item.mapper';
