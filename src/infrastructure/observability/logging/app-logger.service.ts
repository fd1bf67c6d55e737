import { Injectable } from '@nestjs/common';
import { PinoLogger, InjectPinoLogger } from 'nestjs-pino';

export type RepositoryOperation = 'find' | 'list' | 'save';

/**
 * Structured log events emitted by the adapters, one method per component so
 * every event of a kind carries the same fields.
 */
@Injectable()
export class AppLoggerService {
  constructor(
    @InjectPinoLogger(AppLoggerService.name)
    private readonly logger: PinoLogger,
  ) {}

  logTutorCall(context: {
    operation: 'reply' | 'extract_vocabulary';
    model: string;
    inputTokens: number;
    outputTokens: number;
    durationMs: number;
    attempt: number;
    success: boolean;
    error?: string;
  }): void {
    const logData = {
      component: 'ai-tutor',
      ...context,
      totalTokens: context.inputTokens + context.outputTokens,
    };

    if (context.success) {
      this.logger.info(logData, `Tutor ${context.operation} on ${context.model} completed`);
    } else {
      this.logger.warn(
        logData,
        `Tutor ${context.operation} on ${context.model} failed (attempt ${context.attempt})`,
      );
    }
  }

  logRepositoryOperation(context: {
    driver: 'memory' | 'mongodb';
    collection: string;
    operation: RepositoryOperation;
    durationMs: number;
    success: boolean;
    error?: string;
  }): void {
    const logData = {
      component: 'persistence',
      ...context,
    };

    if (context.success) {
      this.logger.debug(logData, `${context.operation} on ${context.collection}`);
    } else {
      this.logger.error(logData, `${context.operation} failed on ${context.collection}`);
    }
  }

  logVocabularyEvent(context: {
    language: string;
    event: 'extracted' | 'dropped';
    count: number;
    reason?: string;
  }): void {
    const logData = { component: 'vocabulary', ...context };

    if (context.event === 'extracted') {
      this.logger.debug(logData, `Extracted ${context.count} lexemes (${context.language})`);
    } else {
      this.logger.warn(logData, `Dropped ${context.count} malformed lexemes (${context.language})`);
    }
  }
}
