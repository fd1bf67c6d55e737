import { Controller, Get, Optional } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import { EnvConfigService } from '@infrastructure/config';

type ServiceStatus = 'healthy' | 'unhealthy' | 'not_configured';

interface ServiceCheck {
  status: ServiceStatus;
  responseTimeMs?: number;
}

/**
 * Controller for health check endpoints.
 *
 * The MongoDB connection only exists with PERSISTENCE_DRIVER=mongodb; with
 * the memory driver the database check reports the driver instead.
 */
@ApiTags('Health')
@SkipThrottle() // Health checks should not be rate limited
@Controller('api/v1/health')
export class HealthController {
  private readonly startTime: Date;

  constructor(
    private readonly envConfig: EnvConfigService,
    @Optional() @InjectConnection() private readonly mongoConnection?: Connection,
  ) {
    this.startTime = new Date();
  }

  @Get()
  @ApiOperation({
    summary: 'Health check',
    description: 'Check the health of the application and its dependencies.',
  })
  @ApiResponse({
    status: 200,
    description: 'Health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', enum: ['healthy', 'degraded'] },
        timestamp: { type: 'string', format: 'date-time' },
        version: { type: 'string', example: '1.0.0' },
        uptime: { type: 'number', description: 'Uptime in seconds' },
        persistenceDriver: { type: 'string', enum: ['memory', 'mongodb'] },
        services: {
          type: 'object',
          properties: {
            database: { type: 'object', properties: { status: { type: 'string' } } },
            aiTutor: { type: 'object', properties: { status: { type: 'string' } } },
          },
        },
      },
    },
  })
  async healthCheck(): Promise<{
    status: 'healthy' | 'degraded';
    timestamp: string;
    version: string;
    uptime: number;
    environment: string;
    persistenceDriver: string;
    services: {
      database: ServiceCheck;
      aiTutor: ServiceCheck;
    };
  }> {
    const database = await this.checkDatabase();
    const aiTutor: ServiceCheck = {
      status: this.envConfig.tutor.apiKey ? 'healthy' : 'not_configured',
    };

    return {
      status: database.status === 'healthy' && aiTutor.status === 'healthy' ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
      uptime: Math.floor((Date.now() - this.startTime.getTime()) / 1000),
      environment: this.envConfig.nodeEnv,
      persistenceDriver: this.envConfig.persistenceDriver,
      services: { database, aiTutor },
    };
  }

  /**
   * Liveness probe for Kubernetes.
   */
  @Get('live')
  @ApiOperation({ summary: 'Liveness probe' })
  @ApiResponse({ status: 200, description: 'Application is alive' })
  live(): { status: string } {
    return { status: 'alive' };
  }

  /**
   * Readiness probe for Kubernetes.
   */
  @Get('ready')
  @ApiOperation({
    summary: 'Readiness probe',
    description: 'Check if the application is ready to receive traffic.',
  })
  @ApiResponse({ status: 200, description: 'Readiness status' })
  async ready(): Promise<{ status: string; reason?: string }> {
    const database = await this.checkDatabase();

    if (database.status !== 'healthy') {
      return { status: 'not_ready', reason: 'Database is not available' };
    }
    return { status: 'ready' };
  }

  private async checkDatabase(): Promise<ServiceCheck> {
    if (this.envConfig.persistenceDriver === 'memory') {
      return { status: 'healthy' };
    }
    if (!this.mongoConnection) {
      return { status: 'unhealthy' };
    }

    const startTime = Date.now();
    try {
      if (this.mongoConnection.readyState !== 1) {
        return { status: 'unhealthy' };
      }
      await this.mongoConnection.db?.admin().ping();
      return { status: 'healthy', responseTimeMs: Date.now() - startTime };
    } catch {
      return { status: 'unhealthy' };
    }
  }
}
