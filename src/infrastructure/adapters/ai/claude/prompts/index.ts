export * from './tutor-system-prompt';
