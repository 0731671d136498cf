import { Module } from '@nestjs/common';

import { AccessService } from './access.service';
import { AccessController } from './access.controller';
import { FacultyModule } from '../faculty/faculty.module';
import { RoomsModule } from '../rooms/rooms.module';
import { SchedulesModule } from '../schedules/schedules.module';
import { TransactionsModule } from '../transactions/transactions.module';
import { TermsModule } from '../terms/terms.module';

@Module({
  imports: [FacultyModule, RoomsModule, SchedulesModule, TransactionsModule, TermsModule],
  controllers: [AccessController],
  providers: [AccessService],
  exports: [AccessService],
})
export class AccessModule {}
