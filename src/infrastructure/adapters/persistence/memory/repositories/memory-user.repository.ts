import { Injectable } from '@nestjs/common';
import { User } from '@domain/entities';
import { UserId } from '@domain/value-objects';
import { IUserRepositoryPort } from '@application/ports';
import { UserDocument, UserMapper } from '../../mongodb';
import { InMemoryDocumentStore } from '../in-memory-document-store';

@Injectable()
export class MemoryUserRepository implements IUserRepositoryPort {
  private readonly store = new InMemoryDocumentStore<UserDocument>('User');

  async findById(id: UserId): Promise<User | null> {
    return this.store.find(id.toString(), (document) => UserMapper.toDomain(document));
  }

  async save(user: User): Promise<void> {
    this.store.write(user, UserMapper.toDocument(user));
  }
}
