import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { LeadsModule } from '../leads/leads.module';
import { ValidationService } from './validation.service';

@Module({
  imports: [LeadsModule, CatalogModule],
  providers: [ValidationService],
  exports: [ValidationService],
})
export class ValidationModule {}
