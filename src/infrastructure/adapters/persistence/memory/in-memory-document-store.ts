import { ConflictError } from '@application/errors';
import { AggregateVersionTracker } from '../aggregate-version-tracker';

export interface VersionedDocument {
  _id: string;
  version: number;
}

/**
 * Map-backed stand-in for a MongoDB collection.
 *
 * Stores copies of the mapped documents, never live entities, so an
 * aggregate changed in memory is not visible to other readers until saved.
 * Writes follow the same version rules as the MongoDB repositories.
 */
export class InMemoryDocumentStore<TDocument extends VersionedDocument> {
  private readonly documents = new Map<string, TDocument>();
  private readonly versions = new AggregateVersionTracker();

  constructor(private readonly resource: string) {}

  find<T extends object>(id: string, toDomain: (document: TDocument) => T): T | null {
    const document = this.documents.get(id);
    return document ? this.hydrate(document, toDomain) : null;
  }

  filter<T extends object>(
    predicate: (document: TDocument) => boolean,
    toDomain: (document: TDocument) => T,
  ): T[] {
    return [...this.documents.values()]
      .filter(predicate)
      .map((document) => this.hydrate(document, toDomain));
  }

  /**
   * Stores the document if the aggregate is new and unknown, or if the stored
   * copy is still at the version the aggregate was loaded at.
   */
  write(aggregate: object, document: TDocument): void {
    const expected = this.versions.versionOf(aggregate);
    const stored = this.documents.get(document._id);

    const stale = expected === 0 ? stored !== undefined : stored?.version !== expected;
    if (stale) {
      throw new ConflictError(this.resource, document._id);
    }

    document.version = expected + 1;
    this.documents.set(document._id, structuredClone(document));
    this.versions.track(aggregate, document.version);
  }

  private hydrate<T extends object>(document: TDocument, toDomain: (document: TDocument) => T): T {
    return this.versions.track(toDomain(structuredClone(document)), document.version);
  }
}
