import { Module } from '@nestjs/common';
import { AdmissionModule } from '../admission/admission.module';
import { ClassificationModule } from '../classification/classification.module';
import { DeliveryModule } from '../delivery/delivery.module';
import { DuplicatesModule } from '../duplicates/duplicates.module';
import { LeadsModule } from '../leads/leads.module';
import { RoutingModule } from '../routing/routing.module';
import { ValidationModule } from '../validation/validation.module';
import { IntakeController } from './intake.controller';
import { IntakeService } from './intake.service';

@Module({
  imports: [
    LeadsModule,
    ClassificationModule,
    AdmissionModule,
    DuplicatesModule,
    ValidationModule,
    RoutingModule,
    DeliveryModule,
  ],
  controllers: [IntakeController],
  providers: [IntakeService],
  exports: [IntakeService],
})
export class IntakeModule {}
