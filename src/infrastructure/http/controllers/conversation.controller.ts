import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Param,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBadGatewayResponse,
  ApiConflictResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import {
  CaptureVocabularyOutputDto,
  ConversationReadModel,
  ConversationSummaryReadModel,
  SendMessageOutputDto,
  StartConversationOutputDto,
} from '@application/dtos';
import {
  ArchiveConversationUseCase,
  CaptureVocabularyUseCase,
  ChangeTutorProfileUseCase,
  DeleteConversationUseCase,
  GetConversationUseCase,
  ListConversationsUseCase,
  ReactivateConversationUseCase,
  RenameConversationUseCase,
  SendMessageUseCase,
  StartConversationUseCase,
} from '@application/use-cases';
import {
  GetConversationQueryDto,
  ListConversationsQueryDto,
  RenameConversationRequestDto,
  SendMessageRequestDto,
  StartConversationRequestDto,
  TutorProfileRequestDto,
} from '../dtos/request';
import { unwrapOrThrow } from '../errors';

/**
 * Controller for tutoring conversations.
 *
 * Covers the conversation lifecycle (start, archive, reactivate, delete),
 * the message exchange with the AI tutor and vocabulary capture from
 * individual messages.
 */
@ApiTags('Conversations')
@Controller('api/v1/conversations')
export class ConversationController {
  private readonly logger = new Logger(ConversationController.name);

  constructor(
    @Inject('StartConversationUseCase')
    private readonly startConversation: StartConversationUseCase,
    @Inject('SendMessageUseCase')
    private readonly sendMessageUseCase: SendMessageUseCase,
    @Inject('ListConversationsUseCase')
    private readonly listConversations: ListConversationsUseCase,
    @Inject('GetConversationUseCase')
    private readonly getConversationUseCase: GetConversationUseCase,
    @Inject('ArchiveConversationUseCase')
    private readonly archiveConversation: ArchiveConversationUseCase,
    @Inject('ReactivateConversationUseCase')
    private readonly reactivateConversation: ReactivateConversationUseCase,
    @Inject('DeleteConversationUseCase')
    private readonly deleteConversation: DeleteConversationUseCase,
    @Inject('ChangeTutorProfileUseCase')
    private readonly changeTutorProfile: ChangeTutorProfileUseCase,
    @Inject('RenameConversationUseCase')
    private readonly renameConversation: RenameConversationUseCase,
    @Inject('CaptureVocabularyUseCase')
    private readonly captureVocabulary: CaptureVocabularyUseCase,
  ) {}

  @Post()
  @ApiOperation({
    summary: 'Start a conversation',
    description: 'The conversation takes the learner’s current language pair.',
  })
  @ApiResponse({ status: 201, description: 'Conversation started' })
  @ApiNotFoundResponse({ description: 'User not found' })
  async start(@Body() dto: StartConversationRequestDto): Promise<StartConversationOutputDto> {
    return unwrapOrThrow(await this.startConversation.execute(dto));
  }

  @Get()
  @ApiOperation({ summary: 'List a learner’s conversations, most recently active first' })
  async list(@Query() query: ListConversationsQueryDto): Promise<ConversationSummaryReadModel[]> {
    return unwrapOrThrow(await this.listConversations.execute(query));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a conversation with its messages' })
  @ApiParam({ name: 'id', example: 'conv_abc123-def456-ghi789' })
  @ApiNotFoundResponse({ description: 'Conversation not found' })
  async getConversation(
    @Param('id') id: string,
    @Query() query: GetConversationQueryDto,
  ): Promise<ConversationReadModel> {
    return unwrapOrThrow(
      await this.getConversationUseCase.execute({ conversationId: id, limit: query.limit }),
    );
  }

  /**
   * Send a message to the tutor.
   *
   * A learner message is answered by the tutor in the same request; the
   * reply is returned together with the ids of both messages.
   */
  @Post(':id/messages')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 30, ttl: 60000 } }) // 30 requests per minute for chat (AI cost protection)
  @ApiOperation({ summary: 'Send a message to the tutor' })
  @ApiConflictResponse({ description: 'Conversation is not active' })
  @ApiNotFoundResponse({ description: 'Conversation not found' })
  @ApiBadGatewayResponse({ description: 'The AI provider failed' })
  async sendMessage(
    @Param('id') id: string,
    @Body() dto: SendMessageRequestDto,
  ): Promise<SendMessageOutputDto> {
    this.logger.debug(
      `Processing message: conversationId=${id}, messageLength=${dto.content.length}`,
    );

    const result = await this.sendMessageUseCase.execute({
      conversationId: id,
      role: dto.role ?? 'user',
      content: dto.content,
    });

    if (result.isLeft()) {
      this.logger.warn(`Message processing failed: ${result.value.message}`);
    }
    return unwrapOrThrow(result);
  }

  @Post(':id/archive')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Archive a conversation' })
  @ApiConflictResponse({ description: 'Conversation is not active' })
  async archive(@Param('id') id: string): Promise<void> {
    unwrapOrThrow(await this.archiveConversation.execute({ conversationId: id }));
  }

  @Post(':id/reactivate')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Reactivate an archived conversation' })
  @ApiConflictResponse({ description: 'Conversation is not archived' })
  async reactivate(@Param('id') id: string): Promise<void> {
    unwrapOrThrow(await this.reactivateConversation.execute({ conversationId: id }));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({
    summary: 'Delete a conversation',
    description: 'Soft delete: the conversation stays readable but can no longer change.',
  })
  @ApiConflictResponse({ description: 'Conversation is already deleted' })
  async remove(@Param('id') id: string): Promise<void> {
    unwrapOrThrow(await this.deleteConversation.execute({ conversationId: id }));
  }

  @Patch(':id/tutor-profile')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Change how the tutor answers in this conversation' })
  async updateTutorProfile(
    @Param('id') id: string,
    @Body() dto: TutorProfileRequestDto,
  ): Promise<void> {
    unwrapOrThrow(await this.changeTutorProfile.execute({ conversationId: id, ...dto }));
  }

  @Patch(':id/title')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Rename a conversation' })
  async rename(@Param('id') id: string, @Body() dto: RenameConversationRequestDto): Promise<void> {
    unwrapOrThrow(await this.renameConversation.execute({ conversationId: id, title: dto.title }));
  }

  @Post(':id/messages/:messageId/vocabulary')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 30, ttl: 60000 } })
  @ApiOperation({
    summary: 'Capture the vocabulary of a message',
    description: 'Extracts the lexemes of one message into the learner’s vocabulary.',
  })
  @ApiNotFoundResponse({ description: 'Conversation or message not found' })
  async capture(
    @Param('id') id: string,
    @Param('messageId') messageId: string,
  ): Promise<CaptureVocabularyOutputDto> {
    return unwrapOrThrow(await this.captureVocabulary.execute({ conversationId: id, messageId }));
  }
}
