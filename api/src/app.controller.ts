import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseConfig, describeDatabase } from './config/database-url';

export interface HealthStatus {
  ok: true;
  env: string;
  database: string;
}

@Controller()
export class AppController {
  constructor(private readonly config: ConfigService) {}

  /** GET /health: liveness plus the backend chosen at startup */
  @Get('health')
  health(): HealthStatus {
    return {
      ok: true,
      env: this.config.getOrThrow<string>('nodeEnv'),
      database: describeDatabase(
        this.config.getOrThrow<DatabaseConfig>('database'),
      ),
    };
  }
}
