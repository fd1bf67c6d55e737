import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { ConfigModule, EnvConfigService } from '@infrastructure/config';
import { LoggerModule } from '@infrastructure/observability/logging';
import { HttpModule } from '@infrastructure/http/http.module';

@Module({
  imports: [
    // Validated environment, available everywhere
    ConfigModule,

    // Structured request and application logs
    LoggerModule,

    // Default rate limit; chat endpoints tighten it with @Throttle
    ThrottlerModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (config: EnvConfigService) => [config.throttle],
    }),

    HttpModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
