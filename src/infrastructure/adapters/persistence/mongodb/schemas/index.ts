export {
  UserDocument,
  UserDocumentType,
  UserSchema,
  ProficiencyDocument,
} from './user.schema';

export {
  ConversationDocument,
  ConversationDocumentType,
  ConversationSchema,
  MessageDocument,
  TutorProfileDocument,
} from './conversation.schema';

export {
  VocabularyItemDocument,
  VocabularyItemDocumentType,
  VocabularyItemSchema,
  LexemeDocument,
  MorphologyDocument,
  EncounterDocument,
  ReviewDocument,
} from './vocabulary-item.schema';
