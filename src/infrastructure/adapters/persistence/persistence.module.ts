import { Module } from '@nestjs/common';
import { ConditionalModule } from '@nestjs/config';
import { MemoryPersistenceModule } from './memory';
import { MongoDBModule } from './mongodb';

const driver = (env: NodeJS.ProcessEnv): string => env.PERSISTENCE_DRIVER ?? 'memory';

/**
 * Binds the repository tokens to the driver named by PERSISTENCE_DRIVER.
 * Only the chosen driver's module is loaded, so the memory driver never
 * opens a MongoDB connection.
 */
@Module({
  imports: [
    ConditionalModule.registerWhen(MemoryPersistenceModule, (env) => driver(env) === 'memory'),
    ConditionalModule.registerWhen(MongoDBModule, (env) => driver(env) === 'mongodb'),
  ],
  exports: [ConditionalModule],
})
export class PersistenceModule {}
