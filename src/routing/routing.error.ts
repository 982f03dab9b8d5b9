import { PipelineError } from '../common/pipeline.error';

export class RoutingError extends PipelineError {
  static invalidPolicy(
    policyId: number,
    offerId: number,
    issues: string[],
  ): RoutingError {
    return new RoutingError(
      'invalid_routing_policy',
      `Routing policy ${policyId} for offer ${offerId} is malformed`,
      422,
      { offer_id: offerId, policy_id: policyId, issues },
    );
  }
}
