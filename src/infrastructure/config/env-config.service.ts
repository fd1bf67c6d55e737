import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TutoringOptions } from '@application/common';
import { ReviewPolicy } from '@domain/services';
import { EnvConfig } from './env.validation';

const HOUR_MS = 60 * 60 * 1000;

export interface TutorSettings {
  readonly apiKey: string | undefined;
  readonly model: string;
  readonly maxTokens: number;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly retryBaseDelayMs: number;
}

/**
 * Typed configuration service for environment variables.
 *
 * Use this instead of ConfigService.get() for autocomplete and compile-time
 * checking. Values are guaranteed to exist because they are validated at
 * application startup by the Zod schema.
 */
@Injectable()
export class EnvConfigService {
  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  get nodeEnv(): EnvConfig['NODE_ENV'] {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get port(): EnvConfig['PORT'] {
    return this.configService.get('PORT', { infer: true });
  }

  get logLevel(): NonNullable<EnvConfig['LOG_LEVEL']> {
    return this.configService.get('LOG_LEVEL', { infer: true }) ?? (this.isProduction ? 'info' : 'debug');
  }

  get persistenceDriver(): EnvConfig['PERSISTENCE_DRIVER'] {
    return this.configService.get('PERSISTENCE_DRIVER', { infer: true });
  }

  get mongoUri(): EnvConfig['MONGO_URI'] {
    return this.configService.get('MONGO_URI', { infer: true });
  }

  get tutor(): TutorSettings {
    return {
      apiKey: this.configService.get('ANTHROPIC_API_KEY', { infer: true }),
      model: this.configService.get('TUTOR_MODEL', { infer: true }),
      maxTokens: this.configService.get('TUTOR_MAX_TOKENS', { infer: true }),
      timeoutMs: this.configService.get('TUTOR_TIMEOUT_MS', { infer: true }),
      maxRetries: this.configService.get('TUTOR_MAX_RETRIES', { infer: true }),
      retryBaseDelayMs: this.configService.get('TUTOR_RETRY_BASE_DELAY_MS', { infer: true }),
    };
  }

  get reviewPolicy(): ReviewPolicy {
    return {
      minIntervalMs: this.configService.get('REVIEW_MIN_INTERVAL_HOURS', { infer: true }) * HOUR_MS,
      growthFactor: this.configService.get('REVIEW_GROWTH_FACTOR', { infer: true }),
      maxIntervalMs:
        this.configService.get('REVIEW_MAX_INTERVAL_DAYS', { infer: true }) * 24 * HOUR_MS,
      masteryStreak: this.configService.get('REVIEW_MASTERY_STREAK', { infer: true }),
    };
  }

  get tutoringOptions(): TutoringOptions {
    return {
      contextWindow: this.configService.get('TUTOR_CONTEXT_WINDOW', { infer: true }),
      reviewPolicy: this.reviewPolicy,
    };
  }

  get throttle(): { ttl: number; limit: number } {
    return {
      ttl: this.configService.get('THROTTLE_TTL_MS', { infer: true }),
      limit: this.configService.get('THROTTLE_LIMIT', { infer: true }),
    };
  }

  get isDevelopment(): boolean {
    return this.nodeEnv === 'development';
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }

  get isTest(): boolean {
    return this.nodeEnv === 'test';
  }
}
