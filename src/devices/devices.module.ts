import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { DeviceEntity } from './device.entity';
import { DevicesService } from './devices.service';
import { DevicesController } from './devices.controller';
import { RoomsModule } from '../rooms/rooms.module';
import { SchedulesModule } from '../schedules/schedules.module';
import { TermsModule } from '../terms/terms.module';

@Module({
  imports: [TypeOrmModule.forFeature([DeviceEntity]), RoomsModule, SchedulesModule, TermsModule],
  controllers: [DevicesController],
  providers: [DevicesService],
  exports: [DevicesService],
})
export class DevicesModule {}
