import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';

import { ScheduleWindowEntity } from './schedule-window.entity';
import { RoomEntity } from '../rooms/room.entity';
import {
  Semester,
  Weekday,
  isSemester,
  normalizeTime,
  normalizeWeekdays,
  timeToSeconds,
} from './weekday';

export type ScheduleWindowInput = {
  roomId: number;
  semester: string;
  days: string | readonly string[];
  startTime: string;
  endTime: string;
  subject?: string;
  instructorName?: string;
  facultyId?: number | null;
  isActive?: boolean;
};

type CleanWindow = Omit<ScheduleWindowInput, 'semester' | 'days'> & {
  semester: Semester;
  days: Weekday[];
};

/**
 * Schedule store: room/day/time/faculty windows per semester.
 */
@Injectable()
export class SchedulesService {
  private readonly logger = new Logger(SchedulesService.name);

  constructor(
    @InjectRepository(ScheduleWindowEntity)
    private readonly windowRepo: Repository<ScheduleWindowEntity>,

    @InjectRepository(RoomEntity)
    private readonly roomRepo: Repository<RoomEntity>,
  ) {}

  private parseDays(days: string | readonly string[]) {
    let parsed: Weekday[];
    try {
      parsed = normalizeWeekdays(days);
    } catch (e) {
      throw new BadRequestException(e instanceof Error ? e.message : 'Invalid day list.');
    }
    if (parsed.length === 0) {
      throw new BadRequestException('Select at least one day of the week.');
    }
    return parsed;
  }

  private clean(input: ScheduleWindowInput): CleanWindow {
    const semester = String(input.semester ?? '').trim().toLowerCase();
    if (!isSemester(semester)) {
      throw new BadRequestException('semester must be one of: 1st, 2nd, summer, summer2.');
    }

    const startTime = normalizeTime(input.startTime);
    const endTime = normalizeTime(input.endTime);
    if (!startTime || !endTime) {
      throw new BadRequestException('startTime and endTime must be HH:MM.');
    }
    if ((timeToSeconds(startTime) ?? 0) >= (timeToSeconds(endTime) ?? 0)) {
      throw new BadRequestException('startTime must be before endTime.');
    }

    return {
      ...input,
      semester,
      days: this.parseDays(input.days),
      startTime,
      endTime,
      subject: String(input.subject ?? '').trim(),
      instructorName: String(input.instructorName ?? '').trim(),
    };
  }

  async createWindow(input: ScheduleWindowInput, now: Date) {
    const w = this.clean(input);

    const room = await this.roomRepo.findOne({ where: { id: w.roomId } });
    if (!room) throw new NotFoundException('Room not found.');

    const window = this.windowRepo.create({
      roomId: w.roomId,
      semester: w.semester,
      days: w.days,
      startTime: w.startTime,
      endTime: w.endTime,
      subject: w.subject ?? '',
      instructorName: w.instructorName ?? '',
      facultyId: w.facultyId ?? null,
      isActive: w.isActive ?? true,
      updatedAt: now,
    });

    return this.windowRepo.save(window);
  }

  /**
   * Changing the day set replaces the window: the original row is deleted
   * and one row per selected day is created. Same set -> untouched.
   */
  async replaceDays(windowId: number, days: string | readonly string[], now: Date) {
    const next = this.parseDays(days);

    const current = await this.windowRepo.findOne({ where: { id: windowId } });
    if (!current) throw new NotFoundException('Schedule not found.');

    const same =
      current.days.length === next.length && current.days.every((d) => next.includes(d));
    if (same) return [current];

    return this.windowRepo.manager.transaction(async (manager) => {
      await manager.delete(ScheduleWindowEntity, { id: current.id });

      const created: ScheduleWindowEntity[] = [];
      for (const day of next) {
        const row = manager.create(ScheduleWindowEntity, {
          roomId: current.roomId,
          semester: current.semester,
          days: [day],
          startTime: current.startTime,
          endTime: current.endTime,
          subject: current.subject,
          instructorName: current.instructorName,
          facultyId: current.facultyId,
          isActive: current.isActive,
          updatedAt: now,
        });
        created.push(await manager.save(row));
      }

      await manager.update(RoomEntity, { id: current.roomId }, { schedulesRevisedAt: now });
      return created;
    });
  }

  async setActive(windowId: number, isActive: boolean, now: Date) {
    const res = await this.windowRepo.update({ id: windowId }, { isActive, updatedAt: now });
    if (res.affected === 0) throw new NotFoundException('Schedule not found.');
  }

  async removeWindow(windowId: number, now: Date) {
    const current = await this.windowRepo.findOne({ where: { id: windowId } });
    if (!current) throw new NotFoundException('Schedule not found.');

    await this.windowRepo.manager.transaction(async (manager) => {
      await manager.delete(ScheduleWindowEntity, { id: current.id });
      await manager.update(RoomEntity, { id: current.roomId }, { schedulesRevisedAt: now });
    });
  }

  /** Active windows that can authorize this faculty in this room, ascending id. */
  async windowsFor(roomId: number, facultyId: number, semester: Semester) {
    return this.windowRepo.find({
      where: { roomId, facultyId, semester, isActive: true },
      order: { id: 'ASC' },
    });
  }

  async windowsForRoom(roomId: number, semester: Semester) {
    return this.windowRepo.find({
      where: { roomId, semester, isActive: true },
      order: { startTime: 'ASC', id: 'ASC' },
    });
  }

  /** Latest updatedAt over every window (active or not) of the room/semester. */
  async lastModifiedAt(roomId: number, semester: Semester): Promise<Date | null> {
    const rows = await this.windowRepo.find({
      where: { roomId, semester },
      select: { id: true, updatedAt: true },
    });

    let latest: Date | null = null;
    for (const r of rows) {
      if (!latest || r.updatedAt > latest) latest = r.updatedAt;
    }
    return latest;
  }

  async countActiveByRoom(roomIds: number[], semester: Semester) {
    const counts = new Map<number, number>();
    if (roomIds.length === 0) return counts;

    const rows = await this.windowRepo.find({
      where: { roomId: In(roomIds), semester, isActive: true },
      select: { id: true, roomId: true },
    });
    for (const r of rows) counts.set(r.roomId, (counts.get(r.roomId) ?? 0) + 1);
    return counts;
  }

  /** Overlapping windows for one faculty/room/term are allowed but reported. */
  warnOverlap(roomId: number, facultyId: number, matches: ScheduleWindowEntity[]) {
    if (matches.length < 2) return;
    this.logger.warn(
      `Overlapping schedules for faculty=${facultyId} room=${roomId}: ids ${matches
        .map((m) => m.id)
        .join(', ')}; using ${matches[0].id}`,
    );
  }
}
