import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Repository } from 'typeorm';

import { TransactionEntity, TransactionSource } from './transaction.entity';
import { isUniqueViolation } from '../common/db-errors';
import type { Semester } from '../schedules/weekday';

export type LedgerAction = 'borrow' | 'return';

export type TermKey = {
  academicYear: string;
  semester: Semester;
};

/** Values copied onto the row at insert time. */
export type AttemptSnapshot = Readonly<{
  facultyName: string;
  roomCode: string;
  badgeCode: string;
}>;

export type LedgerAttempt = {
  credentialId: number;
  roomId: number;
  snapshot: AttemptSnapshot;
  term: TermKey;
  at: Date;
  granted: boolean;
  windowId?: number | null;
  denialCode?: string | null;
  denialReason?: string | null;
  source?: TransactionSource;
};

export type LedgerOutcome = {
  /** null for denials and for late offline events recorded as history */
  action: LedgerAction | null;
  transaction: TransactionEntity;
};

/**
 * Key sessions per (credential, room, term). Closing an open session is the
 * only update; everything else inserts.
 */
@Injectable()
export class SessionLedgerService {
  private readonly logger = new Logger(SessionLedgerService.name);

  constructor(
    @InjectRepository(TransactionEntity)
    private readonly txRepo: Repository<TransactionEntity>,
  ) {}

  private openWhere(credentialId: number, roomId: number, term: TermKey) {
    return {
      credentialId,
      roomId,
      academicYear: term.academicYear,
      semester: term.semester,
      closeTime: IsNull(),
      accessGranted: true,
    };
  }

  async findOpen(credentialId: number, roomId: number, term: TermKey) {
    return this.txRepo.findOne({
      where: this.openWhere(credentialId, roomId, term),
      order: { openTime: 'DESC', id: 'DESC' },
    });
  }

  /** "Is the key currently out" for this credential/room/term. */
  async isKeyOut(credentialId: number, roomId: number, term: TermKey) {
    return this.txRepo.exists({ where: this.openWhere(credentialId, roomId, term) });
  }

  async listOpenSessions(term: TermKey) {
    return this.txRepo.find({
      where: {
        academicYear: term.academicYear,
        semester: term.semester,
        closeTime: IsNull(),
        accessGranted: true,
      },
      order: { openTime: 'DESC', id: 'DESC' },
    });
  }

  async recordAttempt(attempt: LedgerAttempt): Promise<LedgerOutcome> {
    if (!attempt.granted) return this.insertDenied(attempt);
    return this.recordGranted(attempt, true);
  }

  /**
   * Offline events carry the controller's timestamp. A grant older than the
   * currently open session cannot be its return; it is kept as a closed
   * historical row and the open session stays as it is.
   */
  async recordOffline(attempt: LedgerAttempt): Promise<LedgerOutcome> {
    const offline: LedgerAttempt = { ...attempt, source: 'offline' };
    if (!offline.granted) return this.insertDenied(offline);

    const open = await this.findOpen(offline.credentialId, offline.roomId, offline.term);
    if (open && open.openTime.getTime() > offline.at.getTime()) {
      this.logger.warn(
        `Offline grant at ${offline.at.toISOString()} predates open session #${open.id}; stored as history`,
      );
      const row = await this.txRepo.save(
        this.txRepo.create({ ...this.baseRow(offline), closeTime: offline.at, accessGranted: true }),
      );
      return { action: null, transaction: row };
    }

    return this.recordGranted(offline, true);
  }

  private baseRow(a: LedgerAttempt) {
    return {
      credentialId: a.credentialId,
      roomId: a.roomId,
      facultyName: a.snapshot.facultyName,
      roomCode: a.snapshot.roomCode,
      badgeCode: a.snapshot.badgeCode,
      academicYear: a.term.academicYear,
      semester: a.term.semester,
      openTime: a.at,
      source: a.source ?? 'live',
    };
  }

  private async insertDenied(a: LedgerAttempt): Promise<LedgerOutcome> {
    const reason = String(a.denialReason ?? '').trim() || 'Access denied';

    const row = await this.txRepo.save(
      this.txRepo.create({
        ...this.baseRow(a),
        closeTime: null,
        accessGranted: false,
        denialCode: a.denialCode ?? null,
        denialReason: reason.slice(0, 200),
      }),
    );
    return { action: null, transaction: row };
  }

  private async recordGranted(a: LedgerAttempt, mayRetry: boolean): Promise<LedgerOutcome> {
    const open = await this.findOpen(a.credentialId, a.roomId, a.term);

    if (open) {
      const res = await this.txRepo.update(
        { id: open.id, closeTime: IsNull() },
        { closeTime: a.at },
      );

      const closed = await this.txRepo.findOneOrFail({ where: { id: open.id } });
      // without a driver row count, the stored close time tells who won
      const won =
        res.affected === undefined
          ? closed.closeTime?.getTime() === a.at.getTime()
          : res.affected > 0;
      if (won) return { action: 'return', transaction: closed };

      // closed by a concurrent swipe between read and write
      if (!mayRetry) throw new ConflictException('Key session changed concurrently.');
      this.logger.warn(`Session #${open.id} closed concurrently; retrying as borrow`);
      return this.recordGranted(a, false);
    }

    try {
      const row = await this.txRepo.save(
        this.txRepo.create({
          ...this.baseRow(a),
          closeTime: null,
          accessGranted: true,
          scheduleWindowId: a.windowId ?? null,
        }),
      );
      return { action: 'borrow', transaction: row };
    } catch (e) {
      if (!mayRetry || !isUniqueViolation(e)) throw e;

      this.logger.warn(
        `Concurrent borrow for credential=${a.credentialId} room=${a.roomId}; treating as return`,
      );
      return this.recordGranted(a, false);
    }
  }
}
