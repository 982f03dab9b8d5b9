import { Module } from '@nestjs/common';
import { LeadsModule } from '../leads/leads.module';
import { AdmissionService } from './admission.service';
import { IdempotencyService } from './idempotency.service';

@Module({
  imports: [LeadsModule],
  providers: [IdempotencyService, AdmissionService],
  exports: [IdempotencyService, AdmissionService],
})
export class AdmissionModule {}
