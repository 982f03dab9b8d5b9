import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { DeliveryQueueService } from '../delivery/delivery-queue.service';

export type DependencyStatus = 'healthy' | 'unhealthy';

export interface DependencyCheck {
  status: DependencyStatus;
  response_time_ms: number;
  error?: string;
}

export interface HealthReport {
  status: DependencyStatus;
  service: string;
  environment: string;
  timestamp: string;
  uptime_seconds: number;
  checks: {
    database: DependencyCheck;
    redis: DependencyCheck;
  };
}

export interface ReadinessReport {
  status: 'ready' | 'not_ready';
  timestamp: string;
  checks: Record<keyof HealthReport['checks'], string>;
}

const SERVICE_NAME = 'lead-exchange-pipeline';

/** Checks postgres and the Redis server behind the delivery queue */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly deliveryQueue: DeliveryQueueService,
    private readonly configService: ConfigService,
  ) {}

  async check(now = new Date()): Promise<HealthReport> {
    const [database, redis] = await Promise.all([
      this.timed(() => this.dataSource.query('SELECT 1')),
      this.timed(() => this.deliveryQueue.ping()),
    ]);

    const checks = { database, redis };
    const status: DependencyStatus =
      database.status === 'healthy' && redis.status === 'healthy'
        ? 'healthy'
        : 'unhealthy';
    if (status === 'unhealthy') {
      this.logger.warn(
        `Health check failed: database ${database.error ?? 'ok'}, redis ${redis.error ?? 'ok'}`,
      );
    }

    return {
      status,
      service: SERVICE_NAME,
      environment: this.configService.get<string>('NODE_ENV', 'development'),
      timestamp: now.toISOString(),
      uptime_seconds: Math.round(process.uptime()),
      checks,
    };
  }

  async readiness(now = new Date()): Promise<ReadinessReport> {
    const report = await this.check(now);
    const summary = (check: DependencyCheck) =>
      check.error === undefined ? check.status : `error: ${check.error}`;
    return {
      status: report.status === 'healthy' ? 'ready' : 'not_ready',
      timestamp: report.timestamp,
      checks: {
        database: summary(report.checks.database),
        redis: summary(report.checks.redis),
      },
    };
  }

  private async timed(call: () => Promise<unknown>): Promise<DependencyCheck> {
    const started = Date.now();
    try {
      await call();
      return { status: 'healthy', response_time_ms: Date.now() - started };
    } catch (error) {
      return {
        status: 'unhealthy',
        response_time_ms: Date.now() - started,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}
