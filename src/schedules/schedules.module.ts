import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { ScheduleWindowEntity } from './schedule-window.entity';
import { RoomEntity } from '../rooms/room.entity';
import { SchedulesService } from './schedules.service';

@Module({
  imports: [TypeOrmModule.forFeature([ScheduleWindowEntity, RoomEntity])],
  providers: [SchedulesService],
  exports: [SchedulesService],
})
export class SchedulesModule {}
