import {
  Injectable,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue, QueueEvents } from 'bullmq';
import { ConfigService } from '@nestjs/config';
import {
  DELIVERY_DLQ,
  DELIVERY_QUEUE,
  DeadLetterJobData,
  deliveryJobDataSchema,
} from '../delivery.constants';

/**
 * Moves a delivery job to the DLQ once it has failed for good: retries
 * exhausted, or failed with an UnrecoverableError.
 */
@Injectable()
export class DlqEventListener implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DlqEventListener.name);
  private queueEvents: QueueEvents | null = null;

  constructor(
    @InjectQueue(DELIVERY_QUEUE)
    private readonly deliveryQueue: Queue,
    @InjectQueue(DELIVERY_DLQ)
    private readonly dlqQueue: Queue<DeadLetterJobData>,
    private readonly configService: ConfigService,
  ) {}

  onModuleInit(): void {
    this.queueEvents = new QueueEvents(DELIVERY_QUEUE, {
      connection: {
        host: this.configService.get<string>('REDIS_HOST', 'localhost'),
        port: this.configService.get<number>('REDIS_PORT', 6379),
      },
    });

    this.queueEvents.on('failed', ({ jobId, failedReason }) => {
      void this.handleFailedJob(jobId, failedReason).catch((error: unknown) =>
        this.logger.error(
          `Could not dead-letter job ${jobId}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        ),
      );
    });

    this.logger.log('DLQ event listener initialized');
  }

  async handleFailedJob(jobId: string, failedReason: string): Promise<boolean> {
    const job = await this.deliveryQueue.getJob(jobId);
    if (!job) return false;

    // a job with retries left sits in `delayed` after a failure
    const state = await job.getState();
    if (state !== 'failed') return false;

    const data = deliveryJobDataSchema.safeParse(job.data);
    if (!data.success) {
      this.logger.error(`Failed job ${jobId} carries no lead id; not dead-lettered`);
      return false;
    }

    this.logger.warn(
      `Job ${jobId} failed after ${job.attemptsMade} attempts. Moving to DLQ.`,
    );
    const failedAt = new Date(job.finishedOn ?? Date.now());
    await this.dlqQueue.add(
      'dead-letter',
      {
        originalJobId: jobId,
        leadId: data.data.leadId,
        failedAt: failedAt.toISOString(),
        error: failedReason,
        attemptsMade: job.attemptsMade,
      },
      // every app instance hears the event; one entry per failure
      { jobId: `${jobId}-${failedAt.getTime()}` },
    );
    return true;
  }

  async onModuleDestroy(): Promise<void> {
    if (this.queueEvents) {
      await this.queueEvents.close();
    }
  }
}
