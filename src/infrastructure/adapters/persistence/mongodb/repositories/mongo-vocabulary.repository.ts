import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { VocabularyItem } from '@domain/entities';
import { ReviewScheduler } from '@domain/services';
import { Lexeme, UserId } from '@domain/value-objects';
import { IVocabularyRepositoryPort } from '@application/ports';
import { EnvConfigService } from '../../../../config';
import { AppLoggerService } from '../../../../observability/logging';
import { VocabularyItemDocument, VocabularyItemDocumentType } from '../schemas';
import { VocabularyItemMapper } from '../mappers';
import { MongoRepository } from './mongo.repository';

/**
 * MongoDB implementation of IVocabularyRepositoryPort.
 *
 * Due dates are not stored, so `listDue` loads the learner's items and lets
 * the ReviewScheduler decide which are due.
 */
@Injectable()
export class MongoVocabularyRepository extends MongoRepository implements IVocabularyRepositoryPort {
  private readonly scheduler: ReviewScheduler;

  constructor(
    @InjectModel(VocabularyItemDocument.name)
    private readonly vocabularyModel: Model<VocabularyItemDocumentType>,
    appLogger: AppLoggerService,
    config: EnvConfigService,
  ) {
    super(appLogger, 'vocabulary_items');
    this.scheduler = new ReviewScheduler(config.reviewPolicy);
  }

  async findByLexeme(userId: UserId, lexeme: Lexeme): Promise<VocabularyItem | null> {
    const document = await this.timed('find', () =>
      this.vocabularyModel
        .findOne({ userId: userId.toString(), lexemeKey: lexeme.key })
        .exec(),
    );

    if (!document) {
      return null;
    }
    return this.versions.track(VocabularyItemMapper.toDomain(document), document.version);
  }

  async save(item: VocabularyItem): Promise<void> {
    const expected = this.versions.versionOf(item);
    const { _id, ...fields } = VocabularyItemMapper.toDocument(item);
    const version = expected + 1;

    // A duplicate (userId, lexemeKey) means another request created the item first
    await this.timed('save', () =>
      this.writeVersioned(
        'VocabularyItem',
        _id,
        expected,
        () => this.vocabularyModel.create({ _id, ...fields, version }),
        () =>
          this.vocabularyModel.updateOne(
            { _id, version: expected },
            { $set: { ...fields, version } },
          ).exec(),
      ),
    );
    this.versions.track(item, version);
  }

  async listDue(userId: UserId, asOf: Date): Promise<VocabularyItem[]> {
    const items = await this.listByUser(userId);
    return items.filter((item) => this.scheduler.isDue(item, asOf));
  }

  async listByUser(userId: UserId): Promise<VocabularyItem[]> {
    const documents = await this.timed('list', () =>
      this.vocabularyModel.find({ userId: userId.toString() }).exec(),
    );

    return documents.map((document) =>
      this.versions.track(VocabularyItemMapper.toDomain(document), document.version),
    );
  }
}
