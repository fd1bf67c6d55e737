import { Module } from '@nestjs/common';
import { TutoringOptions } from '@application/common';
import {
  IAITutorPort,
  IClockPort,
  IConversationRepositoryPort,
  IUserRepositoryPort,
  IVocabularyRepositoryPort,
} from '@application/ports';
import {
  ArchiveConversationUseCase,
  CaptureVocabularyUseCase,
  ChangeTutorProfileUseCase,
  DeleteConversationUseCase,
  GetConversationUseCase,
  GetDueVocabularyUseCase,
  GetLearnerProfileUseCase,
  ListConversationsUseCase,
  ListVocabularyUseCase,
  ReactivateConversationUseCase,
  ReassessProficiencyUseCase,
  RecordVocabularyReviewUseCase,
  RegisterUserUseCase,
  RenameConversationUseCase,
  SendMessageUseCase,
  StartConversationUseCase,
  UpdateLearnerLanguagesUseCase,
} from '@application/use-cases';
import { ClaudeModule } from '@infrastructure/adapters/ai/claude';
import { ClockModule } from '@infrastructure/adapters/clock';
import { PersistenceModule } from '@infrastructure/adapters/persistence';
import { EnvConfigService } from '@infrastructure/config';
import {
  ConversationController,
  HealthController,
  UsersController,
  VocabularyController,
} from './controllers';

const USER_REPOSITORY = 'IUserRepository';
const CONVERSATION_REPOSITORY = 'IConversationRepository';
const VOCABULARY_REPOSITORY = 'IVocabularyRepository';
const AI_TUTOR = 'IAITutor';
const CLOCK = 'IClock';
const TUTORING_OPTIONS = 'TutoringOptions';

/**
 * HTTP Module that configures all REST API endpoints.
 *
 * Brings together the controllers and wires every use case to the port
 * implementations chosen by the adapter modules.
 */
@Module({
  imports: [PersistenceModule, ClaudeModule, ClockModule],
  controllers: [UsersController, ConversationController, VocabularyController, HealthController],
  providers: [
    {
      provide: TUTORING_OPTIONS,
      useFactory: (config: EnvConfigService): TutoringOptions => config.tutoringOptions,
      inject: [EnvConfigService],
    },

    // Learners
    {
      provide: 'RegisterUserUseCase',
      useFactory: (users: IUserRepositoryPort, clock: IClockPort): RegisterUserUseCase =>
        new RegisterUserUseCase(users, clock),
      inject: [USER_REPOSITORY, CLOCK],
    },
    {
      provide: 'GetLearnerProfileUseCase',
      useFactory: (users: IUserRepositoryPort): GetLearnerProfileUseCase =>
        new GetLearnerProfileUseCase(users),
      inject: [USER_REPOSITORY],
    },
    {
      provide: 'ReassessProficiencyUseCase',
      useFactory: (users: IUserRepositoryPort, clock: IClockPort): ReassessProficiencyUseCase =>
        new ReassessProficiencyUseCase(users, clock),
      inject: [USER_REPOSITORY, CLOCK],
    },
    {
      provide: 'UpdateLearnerLanguagesUseCase',
      useFactory: (users: IUserRepositoryPort, clock: IClockPort): UpdateLearnerLanguagesUseCase =>
        new UpdateLearnerLanguagesUseCase(users, clock),
      inject: [USER_REPOSITORY, CLOCK],
    },

    // Conversations
    {
      provide: 'StartConversationUseCase',
      useFactory: (
        users: IUserRepositoryPort,
        conversations: IConversationRepositoryPort,
        clock: IClockPort,
      ): StartConversationUseCase => new StartConversationUseCase(users, conversations, clock),
      inject: [USER_REPOSITORY, CONVERSATION_REPOSITORY, CLOCK],
    },
    {
      provide: 'SendMessageUseCase',
      useFactory: (
        conversations: IConversationRepositoryPort,
        users: IUserRepositoryPort,
        aiTutor: IAITutorPort,
        clock: IClockPort,
        options: TutoringOptions,
      ): SendMessageUseCase => new SendMessageUseCase(conversations, users, aiTutor, clock, options),
      inject: [CONVERSATION_REPOSITORY, USER_REPOSITORY, AI_TUTOR, CLOCK, TUTORING_OPTIONS],
    },
    {
      provide: 'ListConversationsUseCase',
      useFactory: (conversations: IConversationRepositoryPort): ListConversationsUseCase =>
        new ListConversationsUseCase(conversations),
      inject: [CONVERSATION_REPOSITORY],
    },
    {
      provide: 'GetConversationUseCase',
      useFactory: (conversations: IConversationRepositoryPort): GetConversationUseCase =>
        new GetConversationUseCase(conversations),
      inject: [CONVERSATION_REPOSITORY],
    },
    {
      provide: 'ArchiveConversationUseCase',
      useFactory: (
        conversations: IConversationRepositoryPort,
        clock: IClockPort,
      ): ArchiveConversationUseCase => new ArchiveConversationUseCase(conversations, clock),
      inject: [CONVERSATION_REPOSITORY, CLOCK],
    },
    {
      provide: 'ReactivateConversationUseCase',
      useFactory: (
        conversations: IConversationRepositoryPort,
        clock: IClockPort,
      ): ReactivateConversationUseCase => new ReactivateConversationUseCase(conversations, clock),
      inject: [CONVERSATION_REPOSITORY, CLOCK],
    },
    {
      provide: 'DeleteConversationUseCase',
      useFactory: (
        conversations: IConversationRepositoryPort,
        clock: IClockPort,
      ): DeleteConversationUseCase => new DeleteConversationUseCase(conversations, clock),
      inject: [CONVERSATION_REPOSITORY, CLOCK],
    },
    {
      provide: 'ChangeTutorProfileUseCase',
      useFactory: (
        conversations: IConversationRepositoryPort,
        clock: IClockPort,
      ): ChangeTutorProfileUseCase => new ChangeTutorProfileUseCase(conversations, clock),
      inject: [CONVERSATION_REPOSITORY, CLOCK],
    },
    {
      provide: 'RenameConversationUseCase',
      useFactory: (
        conversations: IConversationRepositoryPort,
        clock: IClockPort,
      ): RenameConversationUseCase => new RenameConversationUseCase(conversations, clock),
      inject: [CONVERSATION_REPOSITORY, CLOCK],
    },

    // Vocabulary
    {
      provide: 'CaptureVocabularyUseCase',
      useFactory: (
        conversations: IConversationRepositoryPort,
        vocabulary: IVocabularyRepositoryPort,
        aiTutor: IAITutorPort,
        clock: IClockPort,
      ): CaptureVocabularyUseCase =>
        new CaptureVocabularyUseCase(conversations, vocabulary, aiTutor, clock),
      inject: [CONVERSATION_REPOSITORY, VOCABULARY_REPOSITORY, AI_TUTOR, CLOCK],
    },
    {
      provide: 'RecordVocabularyReviewUseCase',
      useFactory: (
        vocabulary: IVocabularyRepositoryPort,
        clock: IClockPort,
      ): RecordVocabularyReviewUseCase => new RecordVocabularyReviewUseCase(vocabulary, clock),
      inject: [VOCABULARY_REPOSITORY, CLOCK],
    },
    {
      provide: 'GetDueVocabularyUseCase',
      useFactory: (
        vocabulary: IVocabularyRepositoryPort,
        clock: IClockPort,
        options: TutoringOptions,
      ): GetDueVocabularyUseCase => new GetDueVocabularyUseCase(vocabulary, clock, options),
      inject: [VOCABULARY_REPOSITORY, CLOCK, TUTORING_OPTIONS],
    },
    {
      provide: 'ListVocabularyUseCase',
      useFactory: (
        vocabulary: IVocabularyRepositoryPort,
        options: TutoringOptions,
      ): ListVocabularyUseCase => new ListVocabularyUseCase(vocabulary, options),
      inject: [VOCABULARY_REPOSITORY, TUTORING_OPTIONS],
    },
  ],
})
export class HttpModule {}
