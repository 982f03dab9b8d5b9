import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { DeliveryQueueService } from './delivery-queue.service';
import { DeadLetterService } from './dlq/dead-letter.service';

const SWEEP_INTERVAL_MS = 60 * 60 * 1000;

/** Hourly sweep of stale queued jobs and expired dead letters */
@Injectable()
export class DeliveryMaintenanceService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DeliveryMaintenanceService.name);
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly deliveryQueue: DeliveryQueueService,
    private readonly deadLetters: DeadLetterService,
  ) {}

  onModuleInit(): void {
    this.timer = setInterval(() => {
      void this.sweep();
    }, SWEEP_INTERVAL_MS);
    this.timer.unref();
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async sweep(now = new Date()): Promise<{ staleJobs: number; expiredDeadLetters: number }> {
    let staleJobs = 0;
    let expiredDeadLetters = 0;
    try {
      staleJobs = await this.deliveryQueue.purgeStale();
    } catch (error) {
      this.logger.error(
        `Stale job purge failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
    try {
      expiredDeadLetters = await this.deadLetters.purgeExpired(now);
    } catch (error) {
      this.logger.error(
        `Dead letter purge failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
    return { staleJobs, expiredDeadLetters };
  }
}
