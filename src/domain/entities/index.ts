export { User, LanguageProficiency } from './user.entity';
export { Conversation } from './conversation.entity';
export { ChatMessage } from './chat-message.entity';
export { VocabularyItem, VocabularyEncounter, ReviewRecord } from './vocabulary-item.entity';
