export * from './user.dto';
export * from './conversation.dto';
export * from './tutor-context.dto';
export * from './vocabulary.dto';
