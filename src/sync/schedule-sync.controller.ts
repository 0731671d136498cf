import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Logger,
  Post,
  Query,
} from '@nestjs/common';

import { ScheduleSyncService } from './schedule-sync.service';
import { toDeviceError } from '../common/device-envelope';
import { bodyFields, firstParam, paramFlag, paramText } from '../common/request-params';

@Controller('api/esp32')
export class ScheduleSyncController {
  private readonly logger = new Logger(ScheduleSyncController.name);

  constructor(private readonly sync: ScheduleSyncService) {}

  @Get('schedules')
  schedulesGet(@Query('room') room?: string) {
    return this.schedules(paramText(room));
  }

  @Post('schedules')
  @HttpCode(200)
  async schedulesPost(@Query('room') room: string | undefined, @Body() body: unknown) {
    return this.schedules(firstParam(room, bodyFields(body).room));
  }

  private async schedules(room: string) {
    if (!room) {
      throw new BadRequestException({ status: 'error', message: "Missing 'room' parameter" });
    }

    try {
      const download = await this.sync.downloadSchedule(room, new Date());
      return { status: 'success', ...download };
    } catch (err) {
      throw toDeviceError(err, this.logger, `Schedule download failed (room=${room})`);
    }
  }

  // Usage: /api/esp32/check-updates?room=205&last_sync=2025-01-15T10:30:00
  @Get('check-updates')
  async checkUpdates(@Query('room') roomQ?: string, @Query('last_sync') lastSync?: string) {
    const room = paramText(roomQ);
    if (!room) {
      throw new BadRequestException({ status: 'error', message: "Missing 'room' parameter" });
    }

    try {
      const check = await this.sync.needsUpdate(room, lastSync);
      return {
        status: 'success',
        needs_update: check.needsUpdate,
        current_semester: check.semester,
        current_ay: check.academicYear,
        server_time: new Date().toISOString(),
        message: check.needsUpdate ? 'Update required' : 'Schedules are up to date',
      };
    } catch (err) {
      throw toDeviceError(err, this.logger, `Update check failed (room=${room})`);
    }
  }

  /** Swipes a controller decided on its own while it had no connection. */
  @Post('log-offline')
  @HttpCode(200)
  async logOffline(@Body() raw: unknown) {
    const body = bodyFields(raw);
    const roomCode = paramText(body.room_code);
    const badgeCode = paramText(body.rfid_code);
    const granted = paramFlag(body.access_granted);

    if (!roomCode || !badgeCode || granted === null) {
      throw new BadRequestException({
        status: 'error',
        message: 'Invalid request: room_code, rfid_code and access_granted are required',
      });
    }

    try {
      const merged = await this.sync.mergeOfflineEvent({
        roomCode,
        badgeCode,
        granted,
        timestamp: body.timestamp,
      });
      return {
        status: 'success',
        message: 'Offline access logged',
        action: merged.action ?? '',
        transaction_id: merged.transactionId,
      };
    } catch (err) {
      throw toDeviceError(err, this.logger, `Offline log failed (room=${roomCode}, badge=${badgeCode})`);
    }
  }
}
