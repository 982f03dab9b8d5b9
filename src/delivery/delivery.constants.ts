import { z } from 'zod';

export const DELIVERY_QUEUE = 'lead-delivery';
export const DELIVERY_DLQ = 'lead-delivery-dlq';

export const deliveryJobDataSchema = z.object({
  leadId: z.number().int().positive(),
  /** Delay before each attempt, indexed by attempts already made */
  retryDelaysMs: z.array(z.number().int().min(0)),
});

export type DeliveryJobData = z.infer<typeof deliveryJobDataSchema>;

export const deadLetterJobDataSchema = z.object({
  originalJobId: z.string(),
  leadId: z.number().int().positive(),
  failedAt: z.string(),
  error: z.string(),
  attemptsMade: z.number().int().min(0),
});

export type DeadLetterJobData = z.infer<typeof deadLetterJobDataSchema>;

/** One job per lead; BullMQ ignores an add whose id already exists */
export const deliveryJobId = (leadId: number) => `lead-${leadId}`;
