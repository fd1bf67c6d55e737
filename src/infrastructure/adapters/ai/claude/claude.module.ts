import { Module } from '@nestjs/common';
import { LoggerModule } from '../../../observability/logging';
import { ClaudeTutorAdapter } from './claude-tutor.adapter';

/**
 * Module that provides the AI tutor backed by Anthropic's Claude.
 *
 * The adapter is registered as a class provider so Nest runs its
 * onModuleInit hook; the port token points at that same instance.
 */
@Module({
  imports: [LoggerModule],
  providers: [
    ClaudeTutorAdapter,
    {
      provide: 'IAITutor',
      useExisting: ClaudeTutorAdapter,
    },
  ],
  exports: ['IAITutor'],
})
export class ClaudeModule {}
