import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { InjectDataSource } from '@nestjs/typeorm';
import { describeError } from '../common/utils/errors';

export interface HealthStatus {
  status: 'UP' | 'DOWN';
  database: {
    status: 'UP' | 'DOWN';
    latencyMs?: number;
    message?: string;
  };
  uptimeSeconds: number;
}

@Injectable()
export class SystemService {
  private readonly logger = new Logger(SystemService.name);
  private startTime = Date.now();

  constructor(@InjectDataSource() private dataSource: DataSource) {}

  async checkHealth(): Promise<HealthStatus> {
    const uptimeSeconds = Math.floor((Date.now() - this.startTime) / 1000);
    const started = Date.now();
    try {
      await this.dataSource.query('SELECT 1');
      return {
        status: 'UP',
        database: { status: 'UP', latencyMs: Date.now() - started },
        uptimeSeconds,
      };
    } catch (error) {
      this.logger.error(`Database health check failed: ${describeError(error)}`);
      return {
        status: 'DOWN',
        database: { status: 'DOWN', message: describeError(error) },
        uptimeSeconds,
      };
    }
  }
}
