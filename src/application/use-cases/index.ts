export * from './register-user.use-case';
export * from './reassess-proficiency.use-case';
export * from './update-learner-languages.use-case';
export * from './get-learner-profile.use-case';
export * from './start-conversation.use-case';
export * from './send-message.use-case';
export * from './conversation-lifecycle.use-case';
export * from './change-tutor-profile.use-case';
export * from './rename-conversation.use-case';
export * from './list-conversations.use-case';
export * from './get-conversation.use-case';
export * from './capture-vocabulary.use-case';
export * from './record-vocabulary-review.use-case';
export * from './get-due-vocabulary.use-case';
export * from './list-vocabulary.use-case';
