import { Injectable } from '@nestjs/common';
import { Conversation } from '@domain/entities';
import { ConversationId, ConversationStatus, UserId } from '@domain/value-objects';
import { IConversationRepositoryPort } from '@application/ports';
import { ConversationDocument, ConversationMapper } from '../../mongodb';
import { InMemoryDocumentStore } from '../in-memory-document-store';

@Injectable()
export class MemoryConversationRepository implements IConversationRepositoryPort {
  private readonly store = new InMemoryDocumentStore<ConversationDocument>('Conversation');

  async save(conversation: Conversation): Promise<void> {
    this.store.write(conversation, ConversationMapper.toDocument(conversation));
  }

  async findById(id: ConversationId): Promise<Conversation | null> {
    return this.store.find(id.toString(), (document) => ConversationMapper.toDomain(document));
  }

  async listByUser(userId: UserId, status?: ConversationStatus): Promise<Conversation[]> {
    return this.store.filter(
      (document) =>
        document.userId === userId.toString() &&
        (status === undefined || document.status === status.value),
      (document) => ConversationMapper.toDomain(document),
    );
  }
}
