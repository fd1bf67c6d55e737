import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { User } from '@domain/entities';
import { UserId } from '@domain/value-objects';
import { IUserRepositoryPort } from '@application/ports';
import { AppLoggerService } from '../../../../observability/logging';
import { UserDocument, UserDocumentType } from '../schemas';
import { UserMapper } from '../mappers';
import { MongoRepository } from './mongo.repository';

/**
 * MongoDB implementation of IUserRepositoryPort.
 */
@Injectable()
export class MongoUserRepository extends MongoRepository implements IUserRepositoryPort {
  constructor(
    @InjectModel(UserDocument.name)
    private readonly userModel: Model<UserDocumentType>,
    appLogger: AppLoggerService,
  ) {
    super(appLogger, 'users');
  }

  async findById(id: UserId): Promise<User | null> {
    const document = await this.timed('find', () =>
      this.userModel.findOne({ _id: id.toString() }).exec(),
    );

    if (!document) {
      return null;
    }
    return this.versions.track(UserMapper.toDomain(document), document.version);
  }

  async save(user: User): Promise<void> {
    const expected = this.versions.versionOf(user);
    const { _id, ...fields } = UserMapper.toDocument(user);
    const version = expected + 1;

    await this.timed('save', () =>
      this.writeVersioned(
        'User',
        _id,
        expected,
        () => this.userModel.create({ _id, ...fields, version }),
        () =>
          this.userModel
            .updateOne({ _id, version: expected }, { $set: { ...fields, version } })
            .exec(),
      ),
    );
    this.versions.track(user, version);
  }
}
