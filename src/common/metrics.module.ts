import { Global, Module } from '@nestjs/common';
import {
  billingMetricsProviders,
  deliveryMetricsProviders,
  leadsProcessedCounter,
} from './metrics.providers';

const providers = [
  leadsProcessedCounter,
  ...deliveryMetricsProviders,
  ...billingMetricsProviders,
];

@Global()
@Module({
  providers,
  exports: providers,
})
export class MetricsModule {}
