export { LoggerModule } from './logger.module';
export { AppLoggerService, RepositoryOperation } from './app-logger.service';
