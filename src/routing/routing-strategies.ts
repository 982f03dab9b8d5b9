import type { RoutingStrategy } from './routing-policy.schema';

/** An eligible buyer as the strategies see it */
export interface RoutingCandidate {
  buyerId: number;
  routingPriority: number;
  /** null when the enrollment has no daily cap */
  remainingDaily: number | null;
}

export interface StrategyContext {
  lastAssignedBuyerId: number | null;
}

type Strategy = (
  candidates: RoutingCandidate[],
  context: StrategyContext,
) => RoutingCandidate | undefined;

const byBuyerId = (a: RoutingCandidate, b: RoutingCandidate) =>
  a.buyerId - b.buyerId;

const remaining = (candidate: RoutingCandidate) =>
  candidate.remainingDaily ?? Number.POSITIVE_INFINITY;

export const routingStrategies: Record<RoutingStrategy, Strategy> = {
  priority: (candidates) =>
    [...candidates].sort(
      (a, b) => a.routingPriority - b.routingPriority || byBuyerId(a, b),
    )[0],

  round_robin: (candidates, { lastAssignedBuyerId }) => {
    const ordered = [...candidates].sort(byBuyerId);
    const next =
      lastAssignedBuyerId === null
        ? undefined
        : ordered.find((candidate) => candidate.buyerId > lastAssignedBuyerId);
    return next ?? ordered[0];
  },

  // Infinity - Infinity is NaN, which falls through to the id tie-break
  capacity_weighted: (candidates) =>
    [...candidates].sort(
      (a, b) => remaining(b) - remaining(a) || byBuyerId(a, b),
    )[0],
};
