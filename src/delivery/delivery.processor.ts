import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job, UnrecoverableError, WorkerOptions } from 'bullmq';
import { PipelineError } from '../common/pipeline.error';
import { envSchema } from '../config/env.validation';
import { DELIVERY_QUEUE, deliveryJobDataSchema } from './delivery.constants';
import { DeliveryEngine, DeliveryOutcome } from './delivery.engine';

type DeliveryJob = Pick<Job, 'id' | 'data' | 'attemptsMade'>;

/**
 * Delay before the next try, from the schedule carried on the job. The last
 * entry repeats when attempts outnumber it.
 */
export function deliveryBackoff(
  attemptsMade: number,
  _type?: string,
  _error?: Error,
  job?: { data: unknown },
): number {
  const parsed = deliveryJobDataSchema.safeParse(job?.data);
  const delays = parsed.success ? parsed.data.retryDelaysMs : [];
  return delays[attemptsMade] ?? delays[delays.length - 1] ?? 0;
}

const workerEnvSchema = envSchema.pick({
  DELIVERY_CONCURRENCY: true,
  DELIVERY_VISIBILITY_TIMEOUT_MS: true,
});

/**
 * Worker options read when the decorator is evaluated; the worker's lock
 * manager copies them at construction. A job whose lock lapses is reclaimed
 * as stalled, so the lock duration is the visibility timeout.
 */
export function deliveryWorkerOptions(
  env: Record<string, string | undefined> = process.env,
): Required<Pick<WorkerOptions, 'concurrency' | 'lockDuration' | 'lockRenewTime'>> {
  const { DELIVERY_CONCURRENCY, DELIVERY_VISIBILITY_TIMEOUT_MS } =
    workerEnvSchema.parse(env);
  return {
    concurrency: DELIVERY_CONCURRENCY,
    lockDuration: DELIVERY_VISIBILITY_TIMEOUT_MS,
    lockRenewTime: Math.floor(DELIVERY_VISIBILITY_TIMEOUT_MS / 2),
  };
}

@Processor(DELIVERY_QUEUE, {
  ...deliveryWorkerOptions(),
  settings: { backoffStrategy: deliveryBackoff },
})
export class DeliveryProcessor extends WorkerHost {
  private readonly logger = new Logger(DeliveryProcessor.name);

  constructor(private readonly deliveryEngine: DeliveryEngine) {
    super();
  }

  async process(job: DeliveryJob): Promise<DeliveryOutcome> {
    const data = deliveryJobDataSchema.safeParse(job.data);
    if (!data.success) {
      throw new UnrecoverableError(`Malformed delivery job ${job.id ?? ''}`);
    }

    const { leadId } = data.data;
    const attemptNumber = job.attemptsMade + 1;

    let outcome: DeliveryOutcome;
    try {
      outcome = await this.deliveryEngine.deliver(leadId, attemptNumber);
    } catch (error) {
      if (error instanceof PipelineError) {
        this.logger.error(`Lead ${leadId} cannot be delivered: ${error.code}`);
        throw new UnrecoverableError(`${error.code}: ${error.message}`);
      }
      throw error;
    }

    if (outcome.success) {
      return outcome;
    }
    if (!outcome.retryable) {
      throw new UnrecoverableError(outcome.error ?? 'delivery_failed');
    }
    throw new Error(
      `Delivery attempt ${attemptNumber} for lead ${leadId} failed: ${outcome.error ?? 'unknown'}`,
    );
  }
}
