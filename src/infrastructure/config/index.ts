export { ConfigModule } from './config.module';
export { EnvConfigService, TutorSettings } from './env-config.service';
export { EnvConfig, envSchema, validateEnv } from './env.validation';
