import { DatabaseConfig, resolveDatabaseConfig } from './database-url';

export interface AppConfig {
  nodeEnv: string;
  port: number;
  database: DatabaseConfig;
}

// Centralized, typed configuration for the API
// Export a default factory so ConfigModule.load can consume it.
export default (): AppConfig => ({
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: parseInt(process.env.PORT ?? '5000', 10),

  // Resolved once at startup; a malformed DATABASE_URL fails the boot here.
  database: resolveDatabaseConfig(
    process.env.DATABASE_URL,
    process.env.SQLITE_PATH,
  ),
});
