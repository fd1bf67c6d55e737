export { PersistenceModule } from './persistence.module';
export { AggregateVersionTracker, isDuplicateKeyError } from './aggregate-version-tracker';
export * from './memory';
export * from './mongodb';
