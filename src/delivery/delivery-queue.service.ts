import { InjectQueue } from '@nestjs/bullmq';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Queue } from 'bullmq';
import {
  DELIVERY_DLQ,
  DELIVERY_QUEUE,
  DeliveryJobData,
  deliveryJobId,
} from './delivery.constants';

export interface EnqueueOptions {
  /** Lower runs sooner */
  priority?: number;
  /** Overrides the first entry of the retry schedule */
  delayMs?: number;
}

export interface QueueStats {
  waiting: number;
  prioritized: number;
  delayed: number;
  active: number;
  completed: number;
  failed: number;
  deadLetterQueue: number;
}

const HOUR_MS = 60 * 60 * 1000;
const CLEAN_BATCH = 1000;

@Injectable()
export class DeliveryQueueService {
  private readonly logger = new Logger(DeliveryQueueService.name);
  private readonly retryDelaysMs: number[];
  private readonly maxAttempts: number;
  private readonly defaultPriority: number;
  private readonly purgeMaxAgeMs: number;

  constructor(
    @InjectQueue(DELIVERY_QUEUE)
    private readonly deliveryQueue: Queue<DeliveryJobData>,
    @InjectQueue(DELIVERY_DLQ)
    private readonly dlqQueue: Queue,
    configService: ConfigService,
  ) {
    const delaysSeconds = configService.get<number[]>('DELIVERY_RETRY_DELAYS', [0, 5, 15]);
    this.retryDelaysMs = delaysSeconds.map((seconds) => seconds * 1000);
    this.maxAttempts = configService.get<number>('DELIVERY_MAX_RETRIES', 3);
    this.defaultPriority = configService.get<number>('DELIVERY_DEFAULT_PRIORITY', 5);
    this.purgeMaxAgeMs =
      configService.get<number>('QUEUE_PURGE_MAX_AGE_HOURS', 24) * HOUR_MS;
  }

  /**
   * Schedules delivery of a routed lead. Replays reuse the job id, which
   * BullMQ treats as a no-op while the earlier job is still kept.
   */
  async enqueue(leadId: number, options: EnqueueOptions = {}): Promise<string> {
    const jobId = deliveryJobId(leadId);
    await this.deliveryQueue.add(
      'deliver',
      { leadId, retryDelaysMs: this.retryDelaysMs },
      {
        jobId,
        priority: options.priority ?? this.defaultPriority,
        delay: options.delayMs ?? this.retryDelaysMs[0] ?? 0,
        attempts: this.maxAttempts,
        backoff: { type: 'custom' },
        removeOnComplete: { age: 24 * 60 * 60 },
        removeOnFail: { age: 7 * 24 * 60 * 60 },
      },
    );
    this.logger.debug(`Lead ${leadId} queued for delivery as ${jobId}`);
    return jobId;
  }

  /** Drops a finished job with the lead's id so the lead can be queued again */
  async requeue(leadId: number, options: EnqueueOptions = {}): Promise<string> {
    const existing = await this.deliveryQueue.getJob(deliveryJobId(leadId));
    if (existing) {
      const state = await existing.getState();
      if (state === 'failed' || state === 'completed') {
        await existing.remove();
      }
    }
    return this.enqueue(leadId, options);
  }

  /**
   * Removes queued jobs that never started and are older than `maxAgeMs`.
   * Active jobs are left alone.
   */
  async purgeStale(maxAgeMs = this.purgeMaxAgeMs): Promise<number> {
    let removed = 0;
    for (const state of ['wait', 'prioritized'] as const) {
      let batch: string[];
      do {
        batch = await this.deliveryQueue.clean(maxAgeMs, CLEAN_BATCH, state);
        removed += batch.length;
      } while (batch.length === CLEAN_BATCH);
    }
    if (removed > 0) {
      this.logger.warn(`Purged ${removed} stale delivery jobs`);
    }
    return removed;
  }

  async getStats(): Promise<QueueStats> {
    const counts = await this.deliveryQueue.getJobCounts(
      'wait',
      'prioritized',
      'delayed',
      'active',
      'completed',
      'failed',
    );
    return {
      waiting: counts['wait'] ?? 0,
      prioritized: counts['prioritized'] ?? 0,
      delayed: counts['delayed'] ?? 0,
      active: counts['active'] ?? 0,
      completed: counts['completed'] ?? 0,
      failed: counts['failed'] ?? 0,
      deadLetterQueue: await this.dlqQueue.count(),
    };
  }

  /** Round trip to the Redis server behind the queue */
  async ping(): Promise<string> {
    const client = await this.deliveryQueue.client;
    return client.ping();
  }
}
