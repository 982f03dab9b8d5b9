import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Lead } from './lead.entity';
import { LeadsRepository } from './leads.repository';
import { LEAD_STORE } from './interfaces/lead-store.interface';

@Module({
  imports: [TypeOrmModule.forFeature([Lead])],
  providers: [
    LeadsRepository,
    {
      provide: LEAD_STORE,
      useExisting: LeadsRepository,
    },
  ],
  exports: [LEAD_STORE],
})
export class LeadsModule {}
