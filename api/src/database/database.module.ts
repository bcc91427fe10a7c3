import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DatabaseConfig, describeDatabase } from '../config/database-url';
import { Prediction } from '../predictions/prediction.entity';

export function buildTypeOrmOptions(
  database: DatabaseConfig,
): TypeOrmModuleOptions {
  // synchronize creates the table when it is missing; there are no migrations
  const common = { entities: [Prediction], synchronize: true };
  switch (database.type) {
    case 'better-sqlite3':
      return { ...common, type: 'better-sqlite3', database: database.database };
    case 'postgres':
      return {
        ...common,
        type: 'postgres',
        host: database.host,
        port: database.port,
        database: database.database,
        username: database.username,
        password: database.password,
      };
  }
}

/**
 * Owns the single database handle for the lifetime of the Nest app.
 * The backend is picked once from configuration at startup.
 */
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService): TypeOrmModuleOptions => {
        const database = config.getOrThrow<DatabaseConfig>('database');
        new Logger('DatabaseModule').log(
          `Using ${describeDatabase(database)}`,
        );
        return buildTypeOrmOptions(database);
      },
    }),
  ],
})
export class DatabaseModule {}
