import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';

import { DeviceEntity } from './device.entity';
import { RoomsService } from '../rooms/rooms.service';
import { SchedulesService } from '../schedules/schedules.service';
import { TERM_SOURCE, TermSource } from '../terms/term-source';
import { HEARTBEAT_ONLINE_WINDOW_MS } from '../config/keybox.config';
import { isUniqueViolation } from '../common/db-errors';

export const DEVICE_UNREGISTERED = 'DEVICE_UNREGISTERED';

export type DeviceStatus = {
  id: number;
  deviceName: string;
  deviceId: string;
  roomCode: string | null;
  ipAddress: string | null;
  firmwareVersion: string;
  online: boolean;
  status: 'Online' | 'Offline';
  lastSeen: string | null;
  scheduleCount: number;
};

export function isOnline(device: Pick<DeviceEntity, 'lastHeartbeat'>, now: Date) {
  if (!device.lastHeartbeat) return false;
  return now.getTime() - device.lastHeartbeat.getTime() <= HEARTBEAT_ONLINE_WINDOW_MS;
}

@Injectable()
export class DevicesService {
  private readonly logger = new Logger(DevicesService.name);

  constructor(
    @InjectRepository(DeviceEntity)
    private readonly deviceRepo: Repository<DeviceEntity>,
    private readonly rooms: RoomsService,
    private readonly schedules: SchedulesService,
    @Inject(TERM_SOURCE)
    private readonly terms: TermSource,
  ) {}

  async register(deviceName: string, deviceId: string, roomId: number | null = null) {
    const name = String(deviceName ?? '').trim();
    const hwId = String(deviceId ?? '').trim();
    if (!name || !hwId) {
      throw new BadRequestException('Device name and hardware id are required.');
    }

    if (roomId !== null && !(await this.rooms.findById(roomId))) {
      throw new NotFoundException('Room not found.');
    }

    try {
      return await this.deviceRepo.save(
        this.deviceRepo.create({ deviceName: name, deviceId: hwId, roomId }),
      );
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictException('A device with this name or hardware id already exists.');
      }
      throw err;
    }
  }

  async setActive(id: number, isActive: boolean) {
    const res = await this.deviceRepo.update({ id }, { isActive });
    if (res.affected === 0) throw new NotFoundException('Device not found.');
  }

  /**
   * Records a liveness ping. The firmware version is written only when the
   * controller sends one that differs from what is stored.
   */
  async heartbeat(
    deviceId: string,
    firmwareVersion: string | undefined,
    sourceAddress: string | null,
    now: Date,
  ) {
    const device = await this.deviceRepo.findOne({
      where: { deviceId: deviceId.trim(), isActive: true },
    });

    if (!device) {
      this.logger.warn(`Heartbeat from unregistered device: ${deviceId}`);
      throw new NotFoundException({
        message: 'Device not registered or inactive',
        reason: DEVICE_UNREGISTERED,
      });
    }

    const patch: Partial<DeviceEntity> = { lastHeartbeat: now, ipAddress: sourceAddress };
    const fw = firmwareVersion?.trim();
    if (fw && fw !== device.firmwareVersion) {
      patch.firmwareVersion = fw;
      this.logger.log(`Firmware of ${device.deviceName}: ${device.firmwareVersion || '-'} -> ${fw}`);
    }

    await this.deviceRepo.update({ id: device.id }, patch);
    Object.assign(device, patch);

    const room = device.roomId === null ? null : await this.rooms.findById(device.roomId);
    return { device, roomCode: room?.code ?? null };
  }

  async listStatus(now: Date) {
    const devices = await this.deviceRepo.find({
      where: { isActive: true },
      order: { deviceName: 'ASC' },
    });

    const roomIds = [...new Set(devices.flatMap((d) => (d.roomId === null ? [] : [d.roomId])))];
    const [rooms, term] = await Promise.all([
      this.rooms.findByIds(roomIds),
      this.terms.getCurrentTerm(),
    ]);
    const counts = await this.schedules.countActiveByRoom(roomIds, term.semester);
    const codes = new Map(rooms.map((r) => [r.id, r.code]));

    const items: DeviceStatus[] = devices.map((d) => {
      const online = isOnline(d, now);
      return {
        id: d.id,
        deviceName: d.deviceName,
        deviceId: d.deviceId,
        roomCode: d.roomId === null ? null : codes.get(d.roomId) ?? null,
        ipAddress: d.ipAddress,
        firmwareVersion: d.firmwareVersion,
        online,
        status: online ? 'Online' : 'Offline',
        lastSeen: d.lastHeartbeat ? d.lastHeartbeat.toISOString() : null,
        scheduleCount: d.roomId === null ? 0 : counts.get(d.roomId) ?? 0,
      };
    });

    return {
      semester: term.semester,
      academicYear: term.academicYear,
      online: items.filter((i) => i.online).length,
      total: items.length,
      devices: items,
    };
  }
}
