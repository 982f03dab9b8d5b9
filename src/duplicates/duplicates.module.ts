import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { LeadsModule } from '../leads/leads.module';
import { DuplicateDetectorService } from './duplicate-detector.service';

@Module({
  imports: [LeadsModule, CatalogModule],
  providers: [DuplicateDetectorService],
  exports: [DuplicateDetectorService],
})
export class DuplicatesModule {}
