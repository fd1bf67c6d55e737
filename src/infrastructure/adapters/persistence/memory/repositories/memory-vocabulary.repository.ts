import { Injectable } from '@nestjs/common';
import { VocabularyItem } from '@domain/entities';
import { ReviewScheduler } from '@domain/services';
import { Lexeme, UserId } from '@domain/value-objects';
import { ConflictError } from '@application/errors';
import { IVocabularyRepositoryPort } from '@application/ports';
import { EnvConfigService } from '../../../../config';
import { VocabularyItemDocument, VocabularyItemMapper } from '../../mongodb';
import { InMemoryDocumentStore } from '../in-memory-document-store';

@Injectable()
export class MemoryVocabularyRepository implements IVocabularyRepositoryPort {
  private readonly store = new InMemoryDocumentStore<VocabularyItemDocument>('VocabularyItem');
  private readonly scheduler: ReviewScheduler;

  constructor(config: EnvConfigService) {
    this.scheduler = new ReviewScheduler(config.reviewPolicy);
  }

  async findByLexeme(userId: UserId, lexeme: Lexeme): Promise<VocabularyItem | null> {
    const [item] = this.store.filter(
      (document) => document.userId === userId.toString() && document.lexemeKey === lexeme.key,
      (document) => VocabularyItemMapper.toDomain(document),
    );
    return item ?? null;
  }

  async save(item: VocabularyItem): Promise<void> {
    const document = VocabularyItemMapper.toDocument(item);

    // Mirrors the unique (userId, lexemeKey) index of the MongoDB collection
    const [duplicate] = this.store.filter(
      (stored) =>
        stored.userId === document.userId &&
        stored.lexemeKey === document.lexemeKey &&
        stored._id !== document._id,
      (stored) => VocabularyItemMapper.toDomain(stored),
    );
    if (duplicate) {
      throw new ConflictError('VocabularyItem', document._id);
    }

    this.store.write(item, document);
  }

  async listDue(userId: UserId, asOf: Date): Promise<VocabularyItem[]> {
    const items = await this.listByUser(userId);
    return items.filter((item) => this.scheduler.isDue(item, asOf));
  }

  async listByUser(userId: UserId): Promise<VocabularyItem[]> {
    return this.store.filter(
      (document) => document.userId === userId.toString(),
      (document) => VocabularyItemMapper.toDomain(document),
    );
  }
}
