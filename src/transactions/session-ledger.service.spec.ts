import { TestingModule } from '@nestjs/testing';
import { DataSource, Repository } from 'typeorm';

import { LedgerAttempt, SessionLedgerService } from './session-ledger.service';
import { TransactionsModule } from './transactions.module';
import { TransactionEntity } from './transaction.entity';
import { createKeyboxTestingModule } from '../testing/keybox-testing';

const TERM = { academicYear: '2025-2026', semester: '1st' } as const;

function attempt(at: string, overrides: Partial<LedgerAttempt> = {}): LedgerAttempt {
  return {
    credentialId: 1,
    roomId: 1,
    snapshot: { facultyName: 'Ana Cruz', roomCode: '203', badgeCode: 'RFID-001' },
    term: TERM,
    at: new Date(at),
    granted: true,
    windowId: 7,
    ...overrides,
  };
}

describe('SessionLedgerService', () => {
  let moduleRef: TestingModule;
  let ledger: SessionLedgerService;
  let txRepo: Repository<TransactionEntity>;

  beforeEach(async () => {
    moduleRef = await createKeyboxTestingModule({ imports: [TransactionsModule] });
    ledger = moduleRef.get(SessionLedgerService);
    txRepo = moduleRef.get(DataSource).getRepository(TransactionEntity);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await moduleRef.close();
  });

  it('borrows on the first grant and returns on the second', async () => {
    const borrow = await ledger.recordAttempt(attempt('2025-09-01T08:05:00Z'));
    expect(borrow.action).toBe('borrow');
    expect(borrow.transaction.closeTime).toBeNull();
    expect(borrow.transaction.scheduleWindowId).toBe(7);
    expect(await ledger.isKeyOut(1, 1, TERM)).toBe(true);

    const ret = await ledger.recordAttempt(attempt('2025-09-01T09:40:00Z'));
    expect(ret.action).toBe('return');
    expect(ret.transaction.id).toBe(borrow.transaction.id);
    expect(ret.transaction.closeTime?.toISOString()).toBe('2025-09-01T09:40:00.000Z');

    expect(await txRepo.count()).toBe(1);
    expect(await ledger.isKeyOut(1, 1, TERM)).toBe(false);
  });

  it('starts a new session after a return', async () => {
    await ledger.recordAttempt(attempt('2025-09-01T08:05:00Z'));
    await ledger.recordAttempt(attempt('2025-09-01T09:00:00Z'));
    const again = await ledger.recordAttempt(attempt('2025-09-01T09:30:00Z'));

    expect(again.action).toBe('borrow');
    expect(await txRepo.count()).toBe(2);
    expect(await ledger.listOpenSessions(TERM)).toHaveLength(1);
  });

  it('keeps sessions separate per term', async () => {
    await ledger.recordAttempt(attempt('2025-09-01T08:05:00Z'));
    const other = await ledger.recordAttempt(
      attempt('2025-09-01T08:06:00Z', { term: { academicYear: '2025-2026', semester: '2nd' } }),
    );

    expect(other.action).toBe('borrow');
    expect(await ledger.listOpenSessions(TERM)).toHaveLength(1);
  });

  it('writes one row per denial and leaves the open session alone', async () => {
    await ledger.recordAttempt(attempt('2025-09-01T08:05:00Z'));

    const denied = await ledger.recordAttempt(
      attempt('2025-09-01T08:10:00Z', {
        granted: false,
        denialCode: 'OUTSIDE_SCHEDULED_TIME',
        denialReason: 'Outside of scheduled time (current: 08:10)',
      }),
    );

    expect(denied.action).toBeNull();
    expect(denied.transaction).toMatchObject({
      accessGranted: false,
      denialCode: 'OUTSIDE_SCHEDULED_TIME',
      denialReason: 'Outside of scheduled time (current: 08:10)',
      source: 'live',
    });
    expect(await txRepo.count()).toBe(2);
    expect(await ledger.isKeyOut(1, 1, TERM)).toBe(true);
  });

  it('fills in a reason when a denial has none', async () => {
    const denied = await ledger.recordAttempt(
      attempt('2025-09-01T08:10:00Z', { granted: false, denialReason: '  ' }),
    );
    expect(denied.transaction.denialReason).toBe('Access denied');
  });

  it('treats a borrow that loses the insert race as a return', async () => {
    const first = await ledger.recordAttempt(attempt('2025-09-01T08:05:00Z'));

    // second swipe read "no open session" before the first one was written
    jest.spyOn(ledger, 'findOpen').mockResolvedValueOnce(null);
    const second = await ledger.recordAttempt(attempt('2025-09-01T08:05:01Z'));

    expect(second.action).toBe('return');
    expect(second.transaction.id).toBe(first.transaction.id);
    expect(await txRepo.count()).toBe(1);
  });

  it('starts a new session when its return loses to a concurrent return', async () => {
    const borrow = await ledger.recordAttempt(attempt('2025-09-01T08:05:00Z'));
    const stale = await ledger.findOpen(1, 1, TERM);

    // another swipe closed the session after this one read it as open
    await txRepo.update({ id: borrow.transaction.id }, { closeTime: new Date('2025-09-01T09:00:00Z') });
    jest.spyOn(ledger, 'findOpen').mockResolvedValueOnce(stale);

    const late = await ledger.recordAttempt(attempt('2025-09-01T09:00:01Z'));

    expect(late.action).toBe('borrow');
    expect(late.transaction.id).not.toBe(borrow.transaction.id);
    expect(late.transaction.closeTime).toBeNull();
    expect(await txRepo.count()).toBe(2);

    const first = await txRepo.findOneByOrFail({ id: borrow.transaction.id });
    expect(first.closeTime?.toISOString()).toBe('2025-09-01T09:00:00.000Z');
  });

  describe('recordOffline', () => {
    it('marks rows as offline', async () => {
      const out = await ledger.recordOffline(attempt('2025-09-01T08:05:00Z'));

      expect(out.action).toBe('borrow');
      expect(out.transaction.source).toBe('offline');
    });

    it('stores a grant older than the open session as closed history', async () => {
      const open = await ledger.recordAttempt(attempt('2025-09-01T09:00:00Z'));

      const late = await ledger.recordOffline(attempt('2025-09-01T08:30:00Z'));

      expect(late.action).toBeNull();
      expect(late.transaction.openTime.toISOString()).toBe('2025-09-01T08:30:00.000Z');
      expect(late.transaction.closeTime?.toISOString()).toBe('2025-09-01T08:30:00.000Z');
      expect(late.transaction.accessGranted).toBe(true);

      const still = await ledger.findOpen(1, 1, TERM);
      expect(still?.id).toBe(open.transaction.id);
    });

    it('closes the open session with a newer offline grant', async () => {
      const open = await ledger.recordAttempt(attempt('2025-09-01T08:00:00Z'));
      const ret = await ledger.recordOffline(attempt('2025-09-01T09:00:00Z'));

      expect(ret.action).toBe('return');
      expect(ret.transaction.id).toBe(open.transaction.id);
    });
  });
});
