import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Job } from 'bullmq';
import { Logger } from '@nestjs/common';
import { DELIVERY_DLQ, deadLetterJobDataSchema } from '../delivery.constants';
import { DeadLetterService } from './dead-letter.service';

/** Persists dead-lettered delivery jobs for inspection and reprocessing */
@Processor(DELIVERY_DLQ)
export class DlqProcessor extends WorkerHost {
  private readonly logger = new Logger(DlqProcessor.name);

  constructor(private readonly deadLetterService: DeadLetterService) {
    super();
  }

  async process(job: Pick<Job, 'id' | 'data'>): Promise<string> {
    const parsed = deadLetterJobDataSchema.safeParse(job.data);
    if (!parsed.success) {
      this.logger.error(`DLQ job ${job.id ?? ''} is malformed; dropping it`);
      return 'malformed';
    }

    const { leadId, originalJobId, error, attemptsMade } = parsed.data;
    const entry = await this.deadLetterService.record(parsed.data);
    this.logger.error(
      `DLQ: lead ${leadId} (job ${originalJobId}) dead-lettered as ${entry.id} after ${attemptsMade} attempts: ${error}`,
    );
    return entry.id;
  }
}
