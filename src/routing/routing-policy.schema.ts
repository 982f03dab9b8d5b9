import { z } from 'zod';

export const ROUTING_STRATEGIES = [
  'priority',
  'round_robin',
  'capacity_weighted',
] as const;

export type RoutingStrategy = (typeof ROUTING_STRATEGIES)[number];

export const routingPolicySchema = z
  .object({
    strategy: z.enum(ROUTING_STRATEGIES).default('priority'),
    exclusivity_fallback: z
      .enum(['fail_closed', 'fail_open'])
      .default('fail_closed'),
  })
  .passthrough();

export type RoutingPolicy = z.infer<typeof routingPolicySchema>;
