import { BadRequestException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { formatInTimeZone } from 'date-fns-tz';

import { RoomsService } from '../rooms/rooms.service';
import { SchedulesService } from '../schedules/schedules.service';
import { CredentialsService } from '../faculty/credentials.service';
import { FacultyService } from '../faculty/faculty.service';
import { SessionLedgerService, LedgerAction } from '../transactions/session-ledger.service';
import { TERM_SOURCE, TermSource } from '../terms/term-source';
import { KEYBOX_TIME_ZONE } from '../config/keybox.config';
import { WEEKDAYS, Weekday, localMoment, parseControllerTimestamp } from '../schedules/weekday';

export type ScheduleEntry = {
  id: number;
  day: Weekday;
  start_time: string;
  end_time: string;
  subject: string;
  faculty_name: string;
  faculty_rfids: string[];
  instructor_display: string;
};

export type ScheduleDownload = {
  room_code: string;
  semester: string;
  academic_year: string;
  schedule_count: number;
  schedules: ScheduleEntry[];
  last_updated: string;
  server_time: string;
  day_of_week: Weekday;
};

export type StalenessCheck = {
  needsUpdate: boolean;
  semester: string;
  academicYear: string;
};

export type OfflineEvent = {
  roomCode: string;
  badgeCode: string;
  granted: boolean;
  timestamp: unknown;
};

export const OFFLINE_DENIED = 'OFFLINE_DENIED';

/**
 * Keeps controller schedule caches in line with the current term and
 * folds back what controllers decided while disconnected.
 */
@Injectable()
export class ScheduleSyncService {
  private readonly logger = new Logger(ScheduleSyncService.name);

  constructor(
    private readonly rooms: RoomsService,
    private readonly schedules: SchedulesService,
    private readonly credentials: CredentialsService,
    private readonly faculty: FacultyService,
    private readonly ledger: SessionLedgerService,
    @Inject(TERM_SOURCE) private readonly terms: TermSource,
    @Inject(KEYBOX_TIME_ZONE) private readonly timeZone: string,
  ) {}

  private async activeRoom(roomCode: string) {
    const room = await this.rooms.findActiveByCode(roomCode);
    if (!room) throw new NotFoundException(`Room ${roomCode} not found or inactive`);
    return room;
  }

  /** One entry per (window, day), with the badges valid for offline checks. */
  async downloadSchedule(roomCode: string, now: Date): Promise<ScheduleDownload> {
    const room = await this.activeRoom(roomCode);
    const term = await this.terms.getCurrentTerm();
    const windows = await this.schedules.windowsForRoom(room.id, term.semester);

    const facultyIds = windows.flatMap((w) => (w.facultyId == null ? [] : [w.facultyId]));
    const names = await this.faculty.namesByIds(facultyIds);

    const badges = new Map<number, string[]>();
    for (const fid of new Set(facultyIds)) {
      badges.set(fid, await this.credentials.activeBadgeCodes(fid, room.id));
    }

    const entries: ScheduleEntry[] = [];
    for (const w of windows) {
      for (const day of w.days) {
        entries.push({
          id: w.id,
          day,
          start_time: w.startTime,
          end_time: w.endTime,
          subject: w.subject,
          faculty_name: w.facultyId == null ? '' : names.get(w.facultyId) ?? '',
          faculty_rfids: w.facultyId == null ? [] : badges.get(w.facultyId) ?? [],
          instructor_display: w.instructorName,
        });
      }
    }

    entries.sort(
      (a, b) =>
        WEEKDAYS.indexOf(a.day) - WEEKDAYS.indexOf(b.day) ||
        a.start_time.localeCompare(b.start_time) ||
        a.id - b.id,
    );

    this.logger.log(
      `Schedule download: room=${room.code} semester=${term.semester} entries=${entries.length}`,
    );

    return {
      room_code: room.code,
      semester: term.semester,
      academic_year: term.academicYear,
      schedule_count: entries.length,
      schedules: entries,
      last_updated: now.toISOString(),
      server_time: formatInTimeZone(now, this.timeZone, 'yyyy-MM-dd HH:mm:ss'),
      day_of_week: localMoment(now, this.timeZone).weekday,
    };
  }

  /**
   * Stale when the caller has no usable sync time, or when the term, a window
   * of the room (active or not) or the room's window set changed at or after
   * it. A change in the same millisecond as the sync counts as newer.
   */
  async needsUpdate(roomCode: string, lastSync: unknown): Promise<StalenessCheck> {
    const room = await this.activeRoom(roomCode);
    const term = await this.terms.getCurrentTerm();
    const result = (needsUpdate: boolean): StalenessCheck => ({
      needsUpdate,
      semester: term.semester,
      academicYear: term.academicYear,
    });

    const since = parseControllerTimestamp(lastSync, this.timeZone);
    if (!since) return result(true);

    const after = (d: Date | null) => !!d && d.getTime() >= since.getTime();
    if (after(term.updatedAt) || after(room.schedulesRevisedAt)) return result(true);

    const lastModified = await this.schedules.lastModifiedAt(room.id, term.semester);
    return result(after(lastModified));
  }

  async mergeOfflineEvent(event: OfflineEvent): Promise<{ action: LedgerAction | null; transactionId: number }> {
    const at = parseControllerTimestamp(event.timestamp, this.timeZone);
    if (!at) throw new BadRequestException('timestamp is missing or not a valid date');

    const resolved = await this.credentials.resolve(event.badgeCode);
    if (!resolved) {
      this.logger.warn(`Offline event with unregistered badge "${event.badgeCode}" at "${event.roomCode}"`);
      throw new NotFoundException('RFID card not registered');
    }

    const room = await this.rooms.findByCode(event.roomCode);
    if (!room) {
      this.logger.warn(`Offline event for unknown room "${event.roomCode}"`);
      throw new NotFoundException(`Room ${event.roomCode} not found`);
    }

    const term = await this.terms.getCurrentTerm();
    const outcome = await this.ledger.recordOffline({
      credentialId: resolved.credential.id,
      roomId: room.id,
      snapshot: {
        facultyName: resolved.faculty.fullName,
        roomCode: room.code,
        badgeCode: resolved.credential.badgeCode,
      },
      term,
      at,
      granted: event.granted,
      denialCode: event.granted ? null : OFFLINE_DENIED,
      denialReason: event.granted ? null : 'Denied offline by controller',
    });

    this.logger.log(
      `Offline ${event.granted ? 'grant' : 'denial'} merged: ${resolved.faculty.fullName} @ ${room.code} ` +
        `(${at.toISOString()}, tx #${outcome.transaction.id})`,
    );
    return { action: outcome.action, transactionId: outcome.transaction.id };
  }
}
