import Anthropic from '@anthropic-ai/sdk';
import { ClaudeTutorAdapter } from '@infrastructure/adapters/ai/claude';
import { AppLoggerService } from '@infrastructure/observability/logging';
import { TutorContextDto } from '@application/dtos';
import {
  PortTimeoutError,
  PortUnavailableError,
  ProviderError,
} from '@application/errors';
import { Language, TutorProfile } from '@domain/value-objects';
import { createEnvConfigService } from '../../../../../helpers/env-config';

// Mock Anthropic SDK
const mockMessagesCreate = jest.fn();

jest.mock('@anthropic-ai/sdk', () => {
  class APIError extends Error {
    constructor(
      public readonly status: number | undefined,
      _error: unknown,
      message: string | undefined,
      _headers: unknown,
    ) {
      super(message);
    }
  }
  class APIConnectionError extends APIError {
    constructor({ message }: { message?: string } = {}) {
      super(undefined, undefined, message ?? 'Connection error.', undefined);
    }
  }
  class APIConnectionTimeoutError extends APIConnectionError {
    constructor({ message }: { message?: string } = {}) {
      super({ message: message ?? 'Request timed out.' });
    }
  }

  const MockAnthropic = jest.fn().mockImplementation(() => ({
    messages: {
      create: mockMessagesCreate,
    },
  }));

  return {
    __esModule: true,
    default: Object.assign(MockAnthropic, {
      APIError,
      APIConnectionError,
      APIConnectionTimeoutError,
    }),
  };
});

describe('ClaudeTutorAdapter', () => {
  let adapter: ClaudeTutorAdapter;
  let mockAppLogger: jest.Mocked<AppLoggerService>;

  const spanish = Language.fromCode('es');

  const createAdapter = (overrides: Record<string, string> = {}): ClaudeTutorAdapter => {
    const config = createEnvConfigService({
      ANTHROPIC_API_KEY: 'test-secret',
      TUTOR_RETRY_BASE_DELAY_MS: '0',
      TUTOR_MAX_RETRIES: '3',
      ...overrides,
    });
    const created = new ClaudeTutorAdapter(config, mockAppLogger);
    created.onModuleInit();
    return created;
  };

  const createMockApiResponse = (content: unknown[]) => ({
    content,
    usage: { input_tokens: 120, output_tokens: 40 },
  });

  const textResponse = (text: string) => createMockApiResponse([{ type: 'text', text }]);

  const toolResponse = (input: unknown) =>
    createMockApiResponse([
      { type: 'tool_use', id: 'toolu_test', name: 'record_vocabulary', input },
    ]);

  const context = (messages: TutorContextDto['messages']): TutorContextDto => ({
    conversationId: 'conv_test',
    nativeLanguage: 'en',
    targetLanguage: 'es',
    learnerLevel: 'A2',
    messages,
  });

  beforeEach(() => {
    mockMessagesCreate.mockReset();
    mockAppLogger = {
      logTutorCall: jest.fn(),
      logVocabularyEvent: jest.fn(),
    } as unknown as jest.Mocked<AppLoggerService>;
    adapter = createAdapter();
  });

  describe('onModuleInit', () => {
    it('should create the client without SDK retries', () => {
      expect(Anthropic).toHaveBeenCalledWith({
        apiKey: 'test-secret',
        timeout: 30000,
        maxRetries: 0,
      });
    });

    it('should reject calls when no API key is configured', async () => {
      const unconfigured = new ClaudeTutorAdapter(createEnvConfigService(), mockAppLogger);
      unconfigured.onModuleInit();

      await expect(
        unconfigured.generateReply(context([{ role: 'user', content: 'Hola' }]), TutorProfile.default()),
      ).rejects.toBeInstanceOf(PortUnavailableError);
      expect(mockMessagesCreate).not.toHaveBeenCalled();
    });
  });

  describe('generateReply', () => {
    it('should send the conversation with the profile creativity as temperature', async () => {
      // Arrange
      mockMessagesCreate.mockResolvedValue(textResponse('  ¡Muy bien! ¿Y tú?  '));
      const profile = TutorProfile.create({ creativity: 0.3, style: 'corrective' });

      // Act
      const reply = await adapter.generateReply(
        context([
          { role: 'user', content: 'Hola' },
          { role: 'assistant', content: '¡Hola! ¿Cómo estás?' },
          { role: 'user', content: 'Estoy bien' },
        ]),
        profile,
      );

      // Assert
      expect(reply).toBe('¡Muy bien! ¿Y tú?');
      const request = mockMessagesCreate.mock.calls[0][0];
      expect(request.model).toBe('claude-sonnet-4-20250514');
      expect(request.max_tokens).toBe(1024);
      expect(request.temperature).toBe(0.3);
      expect(request.messages).toEqual([
        { role: 'user', content: 'Hola' },
        { role: 'assistant', content: '¡Hola! ¿Cómo estás?' },
        { role: 'user', content: 'Estoy bien' },
      ]);
      expect(request.system).toContain('native English speaker learning Spanish');
      expect(request.system).toContain('- Level: A2 (Elementary) on the CEFR scale');
      expect(request.system).toContain(profile.toInstructions());
    });

    it('should move system messages to the prompt and merge consecutive turns', async () => {
      // Arrange
      mockMessagesCreate.mockResolvedValue(textResponse('Vale'));

      // Act
      await adapter.generateReply(
        context([
          { role: 'assistant', content: 'Bienvenido' },
          { role: 'system', content: 'Focus on food vocabulary' },
          { role: 'user', content: 'Tengo hambre' },
          { role: 'user', content: 'Mucha hambre' },
        ]),
        TutorProfile.default(),
      );

      // Assert
      const request = mockMessagesCreate.mock.calls[0][0];
      expect(request.messages).toEqual([{ role: 'user', content: 'Tengo hambre\n\nMucha hambre' }]);
      expect(request.system).toContain('## Notes for this conversation\n- Focus on food vocabulary');
    });

    it('should refuse a context without a learner message', async () => {
      await expect(
        adapter.generateReply(
          context([{ role: 'system', content: 'Focus on food vocabulary' }]),
          TutorProfile.default(),
        ),
      ).rejects.toBeInstanceOf(ProviderError);
      expect(mockMessagesCreate).not.toHaveBeenCalled();
    });

    it('should log every call with token usage', async () => {
      mockMessagesCreate.mockResolvedValue(textResponse('Vale'));

      await adapter.generateReply(context([{ role: 'user', content: 'Hola' }]), TutorProfile.default());

      expect(mockAppLogger.logTutorCall).toHaveBeenCalledWith(
        expect.objectContaining({
          operation: 'reply',
          inputTokens: 120,
          outputTokens: 40,
          attempt: 1,
          success: true,
        }),
      );
    });
  });

  describe('retries', () => {
    const hola = context([{ role: 'user', content: 'Hola' }]);

    it('should retry transient API errors', async () => {
      // Arrange
      mockMessagesCreate
        .mockRejectedValueOnce(new Anthropic.APIError(529, undefined, 'Overloaded', undefined))
        .mockRejectedValueOnce(new Anthropic.APIConnectionError({ message: 'socket hang up' }))
        .mockResolvedValueOnce(textResponse('Hola'));

      // Act
      const reply = await adapter.generateReply(hola, TutorProfile.default());

      // Assert
      expect(reply).toBe('Hola');
      expect(mockMessagesCreate).toHaveBeenCalledTimes(3);
      expect(mockAppLogger.logTutorCall).toHaveBeenCalledTimes(3);
    });

    it('should not retry client errors', async () => {
      // Arrange
      mockMessagesCreate.mockRejectedValue(
        new Anthropic.APIError(401, undefined, 'invalid x-api-key', undefined),
      );

      // Act & Assert
      await expect(adapter.generateReply(hola, TutorProfile.default())).rejects.toThrow(
        'Anthropic provider error: 401 invalid x-api-key',
      );
      expect(mockMessagesCreate).toHaveBeenCalledTimes(1);
    });

    it('should report a timeout once attempts run out', async () => {
      mockMessagesCreate.mockRejectedValue(new Anthropic.APIConnectionTimeoutError());

      await expect(adapter.generateReply(hola, TutorProfile.default())).rejects.toThrow(
        new PortTimeoutError('AI tutor', 30000).message,
      );
      expect(mockMessagesCreate).toHaveBeenCalledTimes(3);
    });

    it('should report a connection failure as unavailable', async () => {
      mockMessagesCreate.mockRejectedValue(
        new Anthropic.APIConnectionError({ message: 'getaddrinfo ENOTFOUND' }),
      );

      await expect(adapter.generateReply(hola, TutorProfile.default())).rejects.toBeInstanceOf(
        PortUnavailableError,
      );
    });
  });

  describe('extractVocabulary', () => {
    it('should force the record_vocabulary tool and map its input to lexemes', async () => {
      // Arrange
      mockMessagesCreate.mockResolvedValue(
        toolResponse({
          lexemes: [
            {
              surfaceForm: 'casas',
              lemma: 'casa',
              partOfSpeech: 'noun',
              morphology: { gender: 'feminine', number: 'plural' },
            },
            { surfaceForm: 'quiero', lemma: 'querer', partOfSpeech: 'verb' },
          ],
        }),
      );

      // Act
      const lexemes = await adapter.extractVocabulary('Quiero dos casas', spanish);

      // Assert
      expect(lexemes.map((lexeme) => lexeme.key)).toEqual([
        'es:casa:noun:casas:gender=feminine;number=plural',
        'es:querer:verb:quiero:',
      ]);
      const request = mockMessagesCreate.mock.calls[0][0];
      expect(request.tool_choice).toEqual({ type: 'tool', name: 'record_vocabulary' });
      expect(request.temperature).toBe(0);
      expect(request.messages[0].content).toContain('Quiero dos casas');
      expect(mockAppLogger.logVocabularyEvent).toHaveBeenCalledWith({
        language: 'es',
        event: 'extracted',
        count: 2,
      });
    });

    it('should drop invalid entries and log them', async () => {
      // Arrange
      mockMessagesCreate.mockResolvedValue(
        toolResponse({
          lexemes: [
            { surfaceForm: 'casas', lemma: 'casa', partOfSpeech: 'noun' },
            { surfaceForm: 'rápido', lemma: 'rápido', partOfSpeech: 'gerund' },
            { surfaceForm: '', lemma: 'nada', partOfSpeech: 'noun' },
          ],
        }),
      );

      // Act
      const lexemes = await adapter.extractVocabulary('Casas rápido', spanish);

      // Assert
      expect(lexemes).toHaveLength(1);
      expect(mockAppLogger.logVocabularyEvent).toHaveBeenCalledWith({
        language: 'es',
        event: 'dropped',
        count: 2,
      });
    });

    it('should fail when the tool was not called', async () => {
      mockMessagesCreate.mockResolvedValue(textResponse('No words found'));

      await expect(adapter.extractVocabulary('Hola', spanish)).rejects.toThrow(
        'Anthropic provider error: no vocabulary was recorded',
      );
    });

    it('should fail on malformed tool input', async () => {
      mockMessagesCreate.mockResolvedValue(toolResponse({ words: 'casa' }));

      await expect(adapter.extractVocabulary('Hola', spanish)).rejects.toThrow(
        'Anthropic provider error: vocabulary tool input is malformed',
      );
    });
  });
});
