import { Inject, Injectable, Logger } from '@nestjs/common';
import { Either, TutoringOptions, retryOnConflict, tryCatchAsync } from '@application/common';
import { SendMessageInputDto, SendMessageOutputDto, TutorContextDto } from '@application/dtos';
import {
  ConversationNotFoundError,
  ProviderError,
  TutoringError,
  UserNotFoundError,
  toTutoringError,
} from '@application/errors';
import {
  IAITutorPort,
  ICommandPort,
  IClockPort,
  IConversationRepositoryPort,
  IUserReaderPort,
} from '@application/ports';
import { Conversation } from '@domain/entities';
import { ConversationId, Role } from '@domain/value-objects';

/**
 * SendMessageUseCase appends a message to a conversation.
 *
 * When the learner (role=user) writes, the tutor is asked for a reply and
 * both messages are appended in the same save. The tutor is called at most
 * once per invocation: if the save hits a concurrent write, the conversation
 * is reloaded and the already generated reply is appended again.
 *
 * Tutor failures (ProviderError, PortTimeoutError, PortUnavailableError) are
 * returned as they are and nothing is saved.
 */
@Injectable()
export class SendMessageUseCase implements ICommandPort<SendMessageInputDto, SendMessageOutputDto> {
  private readonly logger = new Logger(SendMessageUseCase.name);

  constructor(
    @Inject('IConversationRepository')
    private readonly conversationRepository: IConversationRepositoryPort,
    @Inject('IUserRepository')
    private readonly userReader: IUserReaderPort,
    @Inject('IAITutor')
    private readonly aiTutor: IAITutorPort,
    @Inject('IClock')
    private readonly clock: IClockPort,
    @Inject('TutoringOptions')
    private readonly options: TutoringOptions,
  ) {}

  async execute(
    input: SendMessageInputDto,
  ): Promise<Either<TutoringError, SendMessageOutputDto>> {
    return tryCatchAsync(async () => {
      const role = Role.fromString(input.role);
      const conversationId = ConversationId.fromString(input.conversationId);
      let reply: string | null = null;

      return retryOnConflict(async () => {
        const conversation = await this.loadConversation(conversationId);
        const message = conversation.appendMessage({
          role,
          content: input.content,
          at: this.clock.now(),
        });

        if (!role.isUser()) {
          await this.conversationRepository.save(conversation);
          return { messageId: message.id.toString(), replyMessageId: null, reply: null };
        }

        if (reply === null) {
          reply = await this.requestReply(conversation);
        }
        const replyMessage = conversation.appendMessage({
          role: Role.assistant(),
          content: reply,
          at: this.clock.now(),
        });

        await this.conversationRepository.save(conversation);
        this.logger.debug(
          `Conversation ${conversation.id.toString()} now has ${conversation.messageCount} messages`,
        );

        return {
          messageId: message.id.toString(),
          replyMessageId: replyMessage.id.toString(),
          reply,
        };
      });
    }, toTutoringError);
  }

  private async loadConversation(id: ConversationId): Promise<Conversation> {
    const conversation = await this.conversationRepository.findById(id);
    if (!conversation) {
      throw new ConversationNotFoundError(id.toString());
    }
    return conversation;
  }

  private async requestReply(conversation: Conversation): Promise<string> {
    const context = await this.buildContext(conversation);
    const reply = await this.aiTutor.generateReply(context, conversation.tutorProfile);

    if (reply.trim().length === 0) {
      throw new ProviderError('AI tutor', 'returned an empty reply');
    }
    return reply;
  }

  private async buildContext(conversation: Conversation): Promise<TutorContextDto> {
    const learner = await this.userReader.findById(conversation.userId);
    if (!learner) {
      throw new UserNotFoundError(conversation.userId.toString());
    }
    const level = learner.levelFor(conversation.languages.target) ?? learner.currentLevel;

    return {
      conversationId: conversation.id.toString(),
      nativeLanguage: conversation.languages.native.code,
      targetLanguage: conversation.languages.target.code,
      learnerLevel: level.value,
      messages: conversation.getRecentMessages(this.options.contextWindow).map((message) => ({
        role: message.role.value,
        content: message.content,
      })),
    };
  }
}
