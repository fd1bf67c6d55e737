import { Module } from '@nestjs/common';
import {
  MemoryConversationRepository,
  MemoryUserRepository,
  MemoryVocabularyRepository,
} from './repositories';

/**
 * Process-local persistence driver. Data lives as long as the process; meant
 * for development and demos, selected with PERSISTENCE_DRIVER=memory.
 */
@Module({
  providers: [
    {
      provide: 'IUserRepository',
      useClass: MemoryUserRepository,
    },
    {
      provide: 'IConversationRepository',
      useClass: MemoryConversationRepository,
    },
    {
      provide: 'IVocabularyRepository',
      useClass: MemoryVocabularyRepository,
    },
  ],
  exports: ['IUserRepository', 'IConversationRepository', 'IVocabularyRepository'],
})
export class MemoryPersistenceModule {}
