import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, LessThan, MoreThan, Repository } from 'typeorm';
import { PipelineError } from '../../common/pipeline.error';
import {
  LEAD_STORE,
  LeadStore,
} from '../../leads/interfaces/lead-store.interface';
import { DeliveryQueueService } from '../delivery-queue.service';
import type { DeadLetterJobData } from '../delivery.constants';
import { DeliveryDeadLetter } from './dead-letter.entity';

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class DeadLetterService {
  private readonly logger = new Logger(DeadLetterService.name);
  private readonly retentionMs: number;

  constructor(
    @InjectRepository(DeliveryDeadLetter)
    private readonly deadLetters: Repository<DeliveryDeadLetter>,
    @Inject(LEAD_STORE)
    private readonly leads: LeadStore,
    private readonly deliveryQueue: DeliveryQueueService,
    configService: ConfigService,
  ) {
    this.retentionMs =
      configService.get<number>('DEAD_LETTER_RETENTION_DAYS', 30) * DAY_MS;
  }

  async record(job: DeadLetterJobData): Promise<DeliveryDeadLetter> {
    const lead = await this.leads.findById(job.leadId);
    const failedAt = new Date(job.failedAt);
    const entry = this.deadLetters.create({
      leadId: job.leadId,
      originalJobId: job.originalJobId,
      error: job.error,
      attemptsMade: job.attemptsMade,
      attemptHistory: lead?.deliveryResult ?? [],
      failedAt,
      expiresAt: new Date(failedAt.getTime() + this.retentionMs),
      reprocessedAt: null,
    });
    return this.deadLetters.save(entry);
  }

  /** Entries not yet reprocessed and not expired, newest first */
  list(limit = 100, now = new Date()): Promise<DeliveryDeadLetter[]> {
    return this.findLive(now, limit);
  }

  /** Puts the lead back on the delivery queue; false if already reprocessed */
  async reprocess(id: string, now = new Date()): Promise<boolean> {
    const entry = await this.deadLetters.findOne({ where: { id } });
    if (!entry) {
      throw new PipelineError(
        'dead_letter_not_found',
        `Dead letter ${id} not found`,
        404,
        { id },
      );
    }
    if (entry.reprocessedAt) {
      return false;
    }

    await this.deliveryQueue.requeue(entry.leadId);
    entry.reprocessedAt = now;
    await this.deadLetters.save(entry);
    this.logger.log(`Dead letter ${id} for lead ${entry.leadId} requeued`);
    return true;
  }

  async reprocessAll(now = new Date()): Promise<number> {
    let requeued = 0;
    for (const entry of await this.findLive(now)) {
      if (await this.reprocess(entry.id, now)) requeued++;
    }
    return requeued;
  }

  private findLive(now: Date, limit?: number): Promise<DeliveryDeadLetter[]> {
    return this.deadLetters.find({
      where: { reprocessedAt: IsNull(), expiresAt: MoreThan(now) },
      order: { failedAt: 'DESC' },
      take: limit,
    });
  }

  async purgeExpired(now = new Date()): Promise<number> {
    const result = await this.deadLetters.delete({ expiresAt: LessThan(now) });
    const removed = result.affected ?? 0;
    if (removed > 0) {
      this.logger.log(`Purged ${removed} expired dead letters`);
    }
    return removed;
  }
}
