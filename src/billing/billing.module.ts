import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { LeadsModule } from '../leads/leads.module';
import { BillingService } from './billing.service';

@Module({
  imports: [LeadsModule, CatalogModule],
  providers: [BillingService],
  exports: [BillingService],
})
export class BillingModule {}
