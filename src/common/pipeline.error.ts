/**
 * Base class for errors a pipeline stage surfaces to its caller.
 * `code` is the stable machine-readable identifier; `httpStatus` is what the
 * intake controller answers with.
 */
export class PipelineError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly httpStatus = 400,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message, ...this.details };
  }
}

/** Missing active validation/routing policy: a misconfiguration, not retried */
export class PolicyNotFoundError extends PipelineError {
  constructor(
    kind: 'validation' | 'routing',
    readonly offerId: number,
  ) {
    super(
      `${kind}_policy_not_found`,
      `No active ${kind} policy for offer ${offerId}`,
      422,
      { offer_id: offerId },
    );
  }
}

export class LeadNotFoundError extends PipelineError {
  constructor(readonly leadId: number) {
    super('lead_not_found', `Lead ${leadId} not found`, 404, {
      lead_id: leadId,
    });
  }
}
