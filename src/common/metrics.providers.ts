import {
  makeCounterProvider,
  makeHistogramProvider,
} from '@willsoto/nestjs-prometheus';

export const LEADS_PROCESSED_TOTAL = 'leads_processed_total';
export const DELIVERY_ATTEMPTS_TOTAL = 'delivery_attempts_total';
export const DELIVERY_DURATION = 'delivery_duration_seconds';
export const LEADS_BILLED_TOTAL = 'leads_billed_total';

export const leadsProcessedCounter = makeCounterProvider({
  name: LEADS_PROCESSED_TOTAL,
  help: 'Leads passing through each pipeline stage, by outcome',
  labelNames: ['stage', 'outcome'],
});

export const deliveryMetricsProviders = [
  makeCounterProvider({
    name: DELIVERY_ATTEMPTS_TOTAL,
    help: 'Delivery channel attempts by channel and result',
    labelNames: ['channel', 'status'],
  }),
  makeHistogramProvider({
    name: DELIVERY_DURATION,
    help: 'Duration of one delivery attempt across all channels in seconds',
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  }),
];

export const billingMetricsProviders = [
  makeCounterProvider({
    name: LEADS_BILLED_TOTAL,
    help: 'Leads billed to buyers',
    labelNames: ['outcome'],
  }),
];
