import { Inject, Injectable, Logger } from '@nestjs/common';

import { Decision, DenialReason } from './decision';
import { CredentialsService } from '../faculty/credentials.service';
import { RoomsService } from '../rooms/rooms.service';
import { SchedulesService } from '../schedules/schedules.service';
import { SessionLedgerService, AttemptSnapshot } from '../transactions/session-ledger.service';
import { TERM_SOURCE, TermSource } from '../terms/term-source';
import { KEYBOX_TIME_ZONE } from '../config/keybox.config';
import { localMoment, timeToSeconds } from '../schedules/weekday';
import type { ScheduleWindowEntity } from '../schedules/schedule-window.entity';

function capitalize(s: string) {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

/**
 * Access decision engine: (badge, room, now) -> grant or deny, with the
 * ledger updated for every decision that reached a credential and a room.
 */
@Injectable()
export class AccessService {
  private readonly logger = new Logger(AccessService.name);

  constructor(
    private readonly credentials: CredentialsService,
    private readonly rooms: RoomsService,
    private readonly schedules: SchedulesService,
    private readonly ledger: SessionLedgerService,
    @Inject(TERM_SOURCE) private readonly terms: TermSource,
    @Inject(KEYBOX_TIME_ZONE) private readonly timeZone: string,
  ) {}

  private lookupFailure(reason: DenialReason, facultyName: string, message: string): Decision {
    return {
      granted: false,
      action: null,
      facultyName,
      message,
      reason,
      reasonText: message,
      windowId: null,
      transactionId: null,
    };
  }

  async decide(badgeCode: string, roomCode: string, now: Date): Promise<Decision> {
    const badge = String(badgeCode ?? '').trim();
    const code = String(roomCode ?? '').trim();

    // ------------------------
    // 1-2. credential + room
    // ------------------------
    const resolved = await this.credentials.resolve(badge);
    if (!resolved) {
      this.logger.warn(`Swipe with unregistered badge "${badge}" at room "${code}"`);
      return this.lookupFailure('CREDENTIAL_UNKNOWN', '', 'RFID card not registered');
    }
    const { credential, faculty } = resolved;

    const room = await this.rooms.findByCode(code);
    if (!room) {
      this.logger.warn(`Swipe by ${faculty.fullName} (${badge}) at unknown room "${code}"`);
      return this.lookupFailure('ROOM_UNKNOWN', faculty.fullName, `Room ${code} not found in system`);
    }

    // ------------------------
    // 3. term, read once
    // ------------------------
    const term = await this.terms.getCurrentTerm();

    const snapshot: AttemptSnapshot = {
      facultyName: faculty.fullName,
      roomCode: room.code,
      badgeCode: credential.badgeCode,
    };

    const deny = async (reason: DenialReason, reasonText: string): Promise<Decision> => {
      const outcome = await this.ledger.recordAttempt({
        credentialId: credential.id,
        roomId: room.id,
        snapshot,
        term,
        at: now,
        granted: false,
        denialCode: reason,
        denialReason: reasonText,
      });

      this.logger.log(`DENIED ${badge} @ ${room.code}: ${reason} (${reasonText})`);
      return {
        granted: false,
        action: null,
        facultyName: faculty.fullName,
        message: `Access denied: ${reasonText}`,
        reason,
        reasonText,
        windowId: null,
        transactionId: outcome.transaction.id,
      };
    };

    if (!credential.isActive) {
      return deny('CREDENTIAL_INACTIVE', 'This card has been deactivated');
    }
    if (!room.isActive) {
      return deny('ROOM_INACTIVE', `Room ${room.code} is currently inactive`);
    }
    if (credential.roomId !== room.id) {
      return deny('CREDENTIAL_ROOM_MISMATCH', `This card is not registered for room ${room.code}`);
    }

    // ------------------------
    // 4-5. schedule windows
    // ------------------------
    const local = localMoment(now, this.timeZone);
    const windows = await this.schedules.windowsFor(room.id, faculty.id, term.semester);

    const today = windows.filter((w) => w.days.includes(local.weekday));
    const matching = today.filter((w) => this.coversSecond(w, local.secondOfDay));

    if (matching.length === 0) {
      if (today.length > 0) {
        return deny('OUTSIDE_SCHEDULED_TIME', `Outside of scheduled time (current: ${local.clock})`);
      }
      return deny(
        'NO_SCHEDULE_TODAY',
        `No schedule for ${capitalize(local.weekday)} in ${term.semester} semester`,
      );
    }

    this.schedules.warnOverlap(room.id, faculty.id, matching);
    const window = matching[0];

    // ------------------------
    // 6. borrow / return
    // ------------------------
    const outcome = await this.ledger.recordAttempt({
      credentialId: credential.id,
      roomId: room.id,
      snapshot,
      term,
      at: now,
      granted: true,
      windowId: window.id,
    });

    const action = outcome.action ?? 'borrow';
    this.logger.log(
      `GRANTED ${badge} @ ${room.code}: ${action} (window #${window.id}, tx #${outcome.transaction.id})`,
    );

    return {
      granted: true,
      action,
      facultyName: faculty.fullName,
      message: action === 'return' ? 'Key returned successfully' : 'Access granted - Key released',
      reason: null,
      reasonText: '',
      windowId: window.id,
      transactionId: outcome.transaction.id,
    };
  }

  // inclusive: 10:00:00 is inside a window ending 10:00, 10:00:30 is not
  private coversSecond(w: ScheduleWindowEntity, second: number) {
    const start = timeToSeconds(w.startTime);
    const end = timeToSeconds(w.endTime);
    if (start == null || end == null) return false;
    return start <= second && second <= end;
  }
}
