export * from './claude-tutor.adapter';
export * from './claude.module';
export * from './tools';
export * from './prompts';
