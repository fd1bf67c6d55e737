/**
 * Remembers the stored version each loaded aggregate was read at, keyed by
 * the entity instance. An aggregate never seen by the tracker is new
 * (version 0) and must not exist in the store yet.
 */
export class AggregateVersionTracker {
  private readonly versions = new WeakMap<object, number>();

  versionOf(aggregate: object): number {
    return this.versions.get(aggregate) ?? 0;
  }

  track<T extends object>(aggregate: T, version: number): T {
    this.versions.set(aggregate, version);
    return aggregate;
  }
}

// MongoDB duplicate key error code
const DUPLICATE_KEY = 11000;

export function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY;
}
