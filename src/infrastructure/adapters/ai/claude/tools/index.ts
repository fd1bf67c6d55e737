export * from './vocabulary-tools';
