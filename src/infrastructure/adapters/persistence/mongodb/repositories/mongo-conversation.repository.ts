import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Conversation } from '@domain/entities';
import { ConversationId, ConversationStatus, UserId } from '@domain/value-objects';
import { IConversationRepositoryPort } from '@application/ports';
import { AppLoggerService } from '../../../../observability/logging';
import { ConversationDocument, ConversationDocumentType } from '../schemas';
import { ConversationMapper } from '../mappers';
import { MongoRepository } from './mongo.repository';

/**
 * MongoDB implementation of IConversationRepositoryPort.
 * A conversation is stored as one document with its messages embedded, so
 * a save rewrites the whole aggregate atomically.
 */
@Injectable()
export class MongoConversationRepository
  extends MongoRepository
  implements IConversationRepositoryPort
{
  constructor(
    @InjectModel(ConversationDocument.name)
    private readonly conversationModel: Model<ConversationDocumentType>,
    appLogger: AppLoggerService,
  ) {
    super(appLogger, 'conversations');
  }

  async save(conversation: Conversation): Promise<void> {
    const expected = this.versions.versionOf(conversation);
    const { _id, ...fields } = ConversationMapper.toDocument(conversation);
    const version = expected + 1;

    await this.timed('save', () =>
      this.writeVersioned(
        'Conversation',
        _id,
        expected,
        () => this.conversationModel.create({ _id, ...fields, version }),
        () =>
          this.conversationModel.updateOne(
            { _id, version: expected },
            { $set: { ...fields, version } },
          ).exec(),
      ),
    );
    this.versions.track(conversation, version);
  }

  async findById(id: ConversationId): Promise<Conversation | null> {
    const document = await this.timed('find', () =>
      this.conversationModel.findOne({ _id: id.toString() }).exec(),
    );

    if (!document) {
      return null;
    }
    return this.versions.track(ConversationMapper.toDomain(document), document.version);
  }

  async listByUser(userId: UserId, status?: ConversationStatus): Promise<Conversation[]> {
    const documents = await this.timed('list', () =>
      this.conversationModel
        .find({
          userId: userId.toString(),
          ...(status && { status: status.value }),
        })
        .exec(),
    );

    return documents.map((document) =>
      this.versions.track(ConversationMapper.toDomain(document), document.version),
    );
  }
}
