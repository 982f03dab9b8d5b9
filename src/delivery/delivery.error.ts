import { PipelineError } from '../common/pipeline.error';

/** Delivery cannot proceed for this lead; retrying will not help */
export class DeliveryError extends PipelineError {
  constructor(code: string, message: string, leadId: number) {
    super(code, message, 409, { lead_id: leadId });
  }
}

/** A channel endpoint answered outside 2xx */
export class ChannelHttpError extends Error {
  constructor(
    readonly statusCode: number,
    readonly body: string,
  ) {
    super(`HTTP ${statusCode}: ${body.slice(0, 200)}`);
    this.name = 'ChannelHttpError';
  }
}
