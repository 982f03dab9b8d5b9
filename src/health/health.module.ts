import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DeliveryModule } from '../delivery/delivery.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [ConfigModule, DeliveryModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
