import { Module } from '@nestjs/common';

import { ScheduleSyncService } from './schedule-sync.service';
import { ScheduleSyncController } from './schedule-sync.controller';
import { RoomsModule } from '../rooms/rooms.module';
import { SchedulesModule } from '../schedules/schedules.module';
import { FacultyModule } from '../faculty/faculty.module';
import { TransactionsModule } from '../transactions/transactions.module';
import { TermsModule } from '../terms/terms.module';

@Module({
  imports: [RoomsModule, SchedulesModule, FacultyModule, TransactionsModule, TermsModule],
  controllers: [ScheduleSyncController],
  providers: [ScheduleSyncService],
  exports: [ScheduleSyncService],
})
export class SyncModule {}
