import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { EnvConfigService } from '@infrastructure/config';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Route Nest's own logger through pino
  const logger = app.get(Logger);
  app.useLogger(logger);

  // Enable CORS for frontend applications
  app.enableCors({
    origin: true,
    credentials: true,
  });

  // Global validation pipe for DTOs
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip unknown properties
      forbidNonWhitelisted: true, // Throw error for unknown properties
      transform: true, // Auto-transform payloads to DTO instances
    }),
  );

  // Swagger API documentation
  const config = new DocumentBuilder()
    .setTitle('Language Tutor API')
    .setDescription(
      `REST API for an AI language tutor.

This API allows you to:
- Register learners and track their CEFR level per language
- Hold tutoring conversations with an AI tutor
- Capture the vocabulary met in conversations and review it with spaced repetition`,
    )
    .setVersion('1.0')
    .addTag('Users', 'Learner registration and profile')
    .addTag('Conversations', 'Talk with the AI tutor')
    .addTag('Vocabulary', 'Captured vocabulary and its review schedule')
    .addTag('Health', 'Application health monitoring')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
      docExpansion: 'list',
      filter: true,
      showRequestDuration: true,
    },
  });

  const env = app.get(EnvConfigService);
  await app.listen(env.port);

  logger.log(
    `Language Tutor API listening on http://localhost:${env.port} ` +
      `(docs at /api/docs, persistence: ${env.persistenceDriver})`,
    'Bootstrap',
  );
}

void bootstrap();
