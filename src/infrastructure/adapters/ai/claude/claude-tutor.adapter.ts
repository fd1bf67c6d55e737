import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import Anthropic from '@anthropic-ai/sdk';
import { Message, MessageParam, TextBlock, ToolUseBlock } from '@anthropic-ai/sdk/resources/messages';
import { CEFRLevel, Language, Lexeme, TutorProfile } from '@domain/value-objects';
import { DomainException } from '@domain/exceptions';
import { IAITutorPort } from '@application/ports';
import { TutorContextDto } from '@application/dtos';
import { LexemeMapper } from '@application/mappers';
import {
  ApplicationError,
  PortTimeoutError,
  PortUnavailableError,
  ProviderError,
} from '@application/errors';
import { EnvConfigService, TutorSettings } from '../../../config';
import { AppLoggerService } from '../../../observability/logging';
import { buildTutorSystemPrompt, VOCABULARY_EXTRACTION_PROMPT } from './prompts';
import {
  RECORD_VOCABULARY_TOOL,
  extractedLexemeSchema,
  recordVocabularyInputSchema,
} from './tools';

const PORT_NAME = 'AI tutor';
const PROVIDER_NAME = 'Anthropic';
const MAX_RETRY_DELAY_MS = 10000;
const EXTRACTION_MAX_TOKENS = 1024;

// Retrying will not fix a bad request, bad credentials or a missing model
const NON_RETRYABLE_STATUSES = new Set([400, 401, 403, 404, 422]);

type TutorOperation = 'reply' | 'extract_vocabulary';

/**
 * Claude adapter implementing the IAITutorPort interface.
 *
 * Replies are plain text generation with the tutor profile's creativity used
 * as temperature. Vocabulary extraction forces a call to the record_vocabulary
 * tool so the lexemes come back structured; entries that fail validation are
 * dropped and logged instead of failing the whole extraction.
 *
 * Transient API failures are retried with exponential backoff. Whatever is
 * left after the last attempt is translated to a port error.
 */
@Injectable()
export class ClaudeTutorAdapter implements IAITutorPort, OnModuleInit {
  private readonly logger = new Logger(ClaudeTutorAdapter.name);
  private readonly settings: TutorSettings;
  private client: Anthropic | null = null;

  constructor(
    config: EnvConfigService,
    private readonly appLogger: AppLoggerService,
  ) {
    this.settings = config.tutor;
  }

  /**
   * Creates the Anthropic client once the module starts. Without an API key
   * the adapter stays unavailable and every call rejects.
   */
  onModuleInit(): void {
    const apiKey = this.settings.apiKey;

    if (!apiKey) {
      this.logger.warn('ANTHROPIC_API_KEY not configured - the AI tutor will not answer');
      return;
    }

    // Retries are handled here, so the SDK's own are turned off
    this.client = new Anthropic({ apiKey, timeout: this.settings.timeoutMs, maxRetries: 0 });
    this.logger.log(`Claude tutor initialized with model: ${this.settings.model}`);
  }

  async generateReply(context: TutorContextDto, profile: TutorProfile): Promise<string> {
    const level = CEFRLevel.fromString(context.learnerLevel);
    const notes = context.messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content);

    const system = buildTutorSystemPrompt({
      nativeLanguage: Language.fromCode(context.nativeLanguage).name,
      targetLanguage: Language.fromCode(context.targetLanguage).name,
      learnerLevel: level.value,
      learnerLevelDescription: level.description,
      profileInstructions: profile.toInstructions(),
      conversationNotes: notes,
    });

    const response = await this.callWithRetry('reply', (client) =>
      client.messages.create({
        model: this.settings.model,
        max_tokens: this.settings.maxTokens,
        temperature: profile.creativity,
        system,
        messages: this.toMessageParams(context),
      }),
    );

    return response.content
      .filter((block): block is TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('')
      .trim();
  }

  async extractVocabulary(text: string, language: Language): Promise<Lexeme[]> {
    const response = await this.callWithRetry('extract_vocabulary', (client) =>
      client.messages.create({
        model: this.settings.model,
        max_tokens: EXTRACTION_MAX_TOKENS,
        temperature: 0,
        tools: [RECORD_VOCABULARY_TOOL],
        tool_choice: { type: 'tool', name: RECORD_VOCABULARY_TOOL.name },
        messages: [{ role: 'user', content: VOCABULARY_EXTRACTION_PROMPT(language.name, text) }],
      }),
    );

    const toolUse = response.content.find(
      (block): block is ToolUseBlock =>
        block.type === 'tool_use' && block.name === RECORD_VOCABULARY_TOOL.name,
    );
    if (!toolUse) {
      throw new ProviderError(PROVIDER_NAME, 'no vocabulary was recorded');
    }

    const parsed = recordVocabularyInputSchema.safeParse(toolUse.input);
    if (!parsed.success) {
      throw new ProviderError(PROVIDER_NAME, 'vocabulary tool input is malformed');
    }

    const lexemes: Lexeme[] = [];
    let dropped = 0;
    for (const entry of parsed.data.lexemes) {
      const lexeme = this.toLexeme(entry, language);
      if (lexeme) {
        lexemes.push(lexeme);
      } else {
        dropped++;
      }
    }

    if (dropped > 0) {
      this.appLogger.logVocabularyEvent({ language: language.code, event: 'dropped', count: dropped });
    }
    this.appLogger.logVocabularyEvent({
      language: language.code,
      event: 'extracted',
      count: lexemes.length,
    });
    return lexemes;
  }

  // Invalid entries yield null; anything other than a validation failure propagates
  private toLexeme(entry: unknown, language: Language): Lexeme | null {
    const parsed = extractedLexemeSchema.safeParse(entry);
    if (!parsed.success) {
      return null;
    }
    try {
      return LexemeMapper.toDomain({ ...parsed.data, language: language.code });
    } catch (error) {
      if (error instanceof DomainException) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Anthropic expects alternating turns starting with the user. System
   * messages go to the system prompt; consecutive turns of the same role are
   * merged and leading assistant turns are dropped.
   */
  private toMessageParams(context: TutorContextDto): MessageParam[] {
    const params: MessageParam[] = [];

    for (const message of context.messages) {
      if (message.role === 'system') continue;
      const role = message.role === 'user' ? 'user' : 'assistant';
      if (params.length === 0 && role === 'assistant') continue;

      const previous = params[params.length - 1];
      if (previous && previous.role === role && typeof previous.content === 'string') {
        params[params.length - 1] = { role, content: `${previous.content}\n\n${message.content}` };
      } else {
        params.push({ role, content: message.content });
      }
    }

    if (params.length === 0) {
      throw new ProviderError(PROVIDER_NAME, 'the conversation has no learner message to answer');
    }
    return params;
  }

  private async callWithRetry(
    operation: TutorOperation,
    call: (client: Anthropic) => Promise<Message>,
  ): Promise<Message> {
    const client = this.client;
    if (!client) {
      throw new PortUnavailableError(PORT_NAME, 'ANTHROPIC_API_KEY is not configured');
    }

    for (let attempt = 1; ; attempt++) {
      const startedAt = Date.now();
      try {
        const response = await call(client);
        this.appLogger.logTutorCall({
          operation,
          model: this.settings.model,
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          durationMs: Date.now() - startedAt,
          attempt,
          success: true,
        });
        return response;
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        this.appLogger.logTutorCall({
          operation,
          model: this.settings.model,
          inputTokens: 0,
          outputTokens: 0,
          durationMs: Date.now() - startedAt,
          attempt,
          success: false,
          error: message,
        });

        if (this.isNonRetryableError(error) || attempt >= this.settings.maxRetries) {
          throw this.toPortError(error);
        }

        const delay = Math.min(
          this.settings.retryBaseDelayMs * Math.pow(2, attempt - 1),
          MAX_RETRY_DELAY_MS,
        );
        this.logger.warn(
          `Claude ${operation} failed (attempt ${attempt}/${this.settings.maxRetries}), ` +
            `retrying in ${delay}ms: ${message}`,
        );
        await this.sleep(delay);
      }
    }
  }

  private isNonRetryableError(error: unknown): boolean {
    if (error instanceof Anthropic.APIConnectionError) {
      return false;
    }
    if (error instanceof Anthropic.APIError) {
      return error.status !== undefined && NON_RETRYABLE_STATUSES.has(error.status);
    }
    return error instanceof ApplicationError;
  }

  // Timeout errors are connection errors in the SDK, so check them first
  private toPortError(error: unknown): ApplicationError {
    if (error instanceof ApplicationError) {
      return error;
    }
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new PortTimeoutError(PORT_NAME, this.settings.timeoutMs);
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return new PortUnavailableError(PORT_NAME, error.message);
    }
    if (error instanceof Anthropic.APIError) {
      return new ProviderError(PROVIDER_NAME, `${error.status ?? 'no status'} ${error.message}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(PROVIDER_NAME, message);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
