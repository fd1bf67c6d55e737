import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { EnvConfigService } from '../../../config';
import { LoggerModule } from '../../../observability/logging';
import {
  ConversationDocument,
  ConversationSchema,
  UserDocument,
  UserSchema,
  VocabularyItemDocument,
  VocabularyItemSchema,
} from './schemas';
import {
  MongoConversationRepository,
  MongoUserRepository,
  MongoVocabularyRepository,
} from './repositories';

/**
 * Module that configures the MongoDB persistence driver.
 *
 * Opens the connection, registers the Mongoose schemas and binds the
 * repositories to the port tokens the use cases inject.
 *
 * @example
 * ```typescript
 * constructor(
 *   @Inject('IConversationRepository')
 *   private readonly conversationRepository: IConversationRepositoryPort,
 * ) {}
 * ```
 */
@Module({
  imports: [
    LoggerModule,
    MongooseModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (config: EnvConfigService) => ({
        uri: config.mongoUri,
      }),
    }),
    MongooseModule.forFeature([
      { name: UserDocument.name, schema: UserSchema },
      { name: ConversationDocument.name, schema: ConversationSchema },
      { name: VocabularyItemDocument.name, schema: VocabularyItemSchema },
    ]),
  ],
  providers: [
    {
      provide: 'IUserRepository',
      useClass: MongoUserRepository,
    },
    {
      provide: 'IConversationRepository',
      useClass: MongoConversationRepository,
    },
    {
      provide: 'IVocabularyRepository',
      useClass: MongoVocabularyRepository,
    },
  ],
  exports: ['IUserRepository', 'IConversationRepository', 'IVocabularyRepository'],
})
export class MongoDBModule {}
