import type { Lead, LeadStatus } from './lead.entity';
import type { TransitionOutcome } from './interfaces/lead-store.interface';

const VALIDATED_OR_LATER: readonly LeadStatus[] = [
  'validated',
  'delivered',
  'accepted',
];

/**
 * Predicates deciding whether a re-read row already reflects a transition.
 * Shared by every LeadStore implementation so they agree on outcomes.
 */
export const transitionReached = {
  validated: (lead: Lead) => VALIDATED_OR_LATER.includes(lead.status),
  rejected: (lead: Lead) => lead.status === 'rejected',
  assigned: (buyerId: number) => (lead: Lead) => lead.buyerId === buyerId,
  delivered: (buyerId: number) => (lead: Lead) =>
    (lead.status === 'delivered' || lead.status === 'accepted') &&
    lead.buyerId === buyerId,
  billed: (lead: Lead) => lead.billingStatus !== 'pending',
};

/** Turns a zero-row guarded update into an outcome from the re-read row */
export function settleTransition(
  current: Lead | null,
  reached: (lead: Lead) => boolean,
): TransitionOutcome {
  if (current && reached(current)) {
    return { outcome: 'already_applied', current };
  }
  return { outcome: 'conflict', current };
}

export function isPreDelivery(status: LeadStatus): boolean {
  return status === 'received' || status === 'validated';
}
