import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { LeadsModule } from '../leads/leads.module';
import { RoutingService } from './routing.service';

@Module({
  imports: [LeadsModule, CatalogModule],
  providers: [RoutingService],
  exports: [RoutingService],
})
export class RoutingModule {}
