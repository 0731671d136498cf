import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Logger,
  Post,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import type { Request } from 'express';

import { DevicesService } from './devices.service';
import { RolesGuard } from '../auth/roles/roles.guard';
import { Roles } from '../roles/roles.decorator';
import { toDeviceError } from '../common/device-envelope';
import { bodyFields, paramText } from '../common/request-params';

type HeartbeatParams = { device_id?: unknown; firmware_version?: unknown };

type PeerInfo = { headers: Request['headers']; ip?: string };

export function sourceAddressOf(req: PeerInfo) {
  const fwd = req.headers['x-forwarded-for'];
  const first = (Array.isArray(fwd) ? fwd[0] : fwd)?.split(',')[0]?.trim();
  return first || req.ip || null;
}

@Controller()
export class DevicesController {
  private readonly logger = new Logger(DevicesController.name);

  constructor(private readonly devices: DevicesService) {}

  @Get('api/esp32/heartbeat')
  heartbeatGet(@Query() query: HeartbeatParams, @Req() req: PeerInfo) {
    return this.heartbeat(query, {}, req);
  }

  @Post('api/esp32/heartbeat')
  @HttpCode(200)
  async heartbeatPost(
    @Query() query: HeartbeatParams,
    @Body() body: unknown,
    @Req() req: PeerInfo,
  ) {
    return this.heartbeat(query, bodyFields(body), req);
  }

  private async heartbeat(query: HeartbeatParams, body: Record<string, unknown>, req: PeerInfo) {
    const fromQuery = paramText(query.device_id);
    const deviceId = fromQuery || paramText(body.device_id);
    const firmware = paramText(fromQuery ? query.firmware_version : body.firmware_version);

    if (!deviceId) {
      throw new BadRequestException({
        status: 'error',
        message: 'Missing device_id parameter',
        hint: 'Send device_id as a query parameter, form field or JSON body field',
      });
    }

    try {
      const { device, roomCode } = await this.devices.heartbeat(
        deviceId,
        firmware || undefined,
        sourceAddressOf(req),
        new Date(),
      );
      return {
        status: 'success',
        message: 'Heartbeat received',
        device_name: device.deviceName,
        room: roomCode,
        timestamp: device.lastHeartbeat?.toISOString() ?? null,
      };
    } catch (err) {
      throw toDeviceError(err, this.logger, `Heartbeat failed (device=${deviceId})`, {
        device_id_received: deviceId,
      });
    }
  }

  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('staff', 'admin')
  @Get('devices/status')
  async status() {
    const report = await this.devices.listStatus(new Date());
    return { ok: true, ...report };
  }
}
