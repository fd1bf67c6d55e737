export { MemoryPersistenceModule } from './memory.module';
export { InMemoryDocumentStore, VersionedDocument } from './in-memory-document-store';
export * from './repositories';
