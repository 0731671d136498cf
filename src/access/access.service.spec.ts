import { TestingModule } from '@nestjs/testing';
import { DataSource, Repository } from 'typeorm';

import { AccessService } from './access.service';
import { AccessModule } from './access.module';
import { TransactionEntity } from '../transactions/transaction.entity';
import { RoomEntity } from '../rooms/room.entity';
import { CredentialEntity } from '../faculty/credential.entity';
import { ScheduleWindowEntity } from '../schedules/schedule-window.entity';
import { TermsService } from '../terms/terms.service';
import { Seeded, createKeyboxTestingModule, seedRoomAccess } from '../testing/keybox-testing';

// 2025-09-01 is a Monday; the testing module reads clocks in UTC.
const MON = (hhmmss: string) => new Date(`2025-09-01T${hhmmss}Z`);
const TUE = (hhmmss: string) => new Date(`2025-09-02T${hhmmss}Z`);
const WED = (hhmmss: string) => new Date(`2025-09-03T${hhmmss}Z`);

describe('AccessService', () => {
  let moduleRef: TestingModule;
  let access: AccessService;
  let txRepo: Repository<TransactionEntity>;
  let ds: DataSource;
  let seeded: Seeded;

  beforeEach(async () => {
    moduleRef = await createKeyboxTestingModule({ imports: [AccessModule] });
    access = moduleRef.get(AccessService);
    ds = moduleRef.get(DataSource);
    txRepo = ds.getRepository(TransactionEntity);
    seeded = await seedRoomAccess(ds);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('runs the borrow / return / no-schedule scenario', async () => {
    await ds.getRepository(ScheduleWindowEntity).update({ id: seeded.window.id }, { days: ['monday'] });

    const borrow = await access.decide('RFID-001', '203', MON('08:30:00'));
    expect(borrow).toMatchObject({
      granted: true,
      action: 'borrow',
      facultyName: 'Ana Cruz',
      message: 'Access granted - Key released',
      reason: null,
      windowId: seeded.window.id,
      transactionId: 1,
    });

    const ret = await access.decide('RFID-001', '203', MON('09:00:00'));
    expect(ret).toMatchObject({
      granted: true,
      action: 'return',
      message: 'Key returned successfully',
      transactionId: 1,
    });
    expect(await txRepo.count()).toBe(1);

    const closed = await txRepo.findOneByOrFail({ id: 1 });
    expect(closed.closeTime?.toISOString()).toBe('2025-09-01T09:00:00.000Z');

    const tuesday = await access.decide('RFID-001', '203', TUE('08:30:00'));
    expect(tuesday).toMatchObject({
      granted: false,
      action: null,
      reason: 'NO_SCHEDULE_TODAY',
      reasonText: 'No schedule for Tuesday in 1st semester',
      message: 'Access denied: No schedule for Tuesday in 1st semester',
      transactionId: 2,
    });

    const denied = await txRepo.findOneByOrFail({ id: 2 });
    expect(denied).toMatchObject({
      accessGranted: false,
      denialCode: 'NO_SCHEDULE_TODAY',
      facultyName: 'Ana Cruz',
      roomCode: '203',
      badgeCode: 'RFID-001',
      academicYear: '2025-2026',
      semester: '1st',
    });
  });

  it('grants on every listed weekday within hours', async () => {
    const mon = await access.decide('RFID-001', '203', MON('08:00:00'));
    const wed = await access.decide('RFID-001', '203', WED('09:59:00'));

    expect(mon.granted).toBe(true);
    expect(wed.granted).toBe(true);
  });

  it('includes the end minute and denies one minute after it', async () => {
    const atEnd = await access.decide('RFID-001', '203', MON('10:00:00'));
    expect(atEnd.granted).toBe(true);

    const late = await access.decide('RFID-001', '203', MON('10:01:00'));
    expect(late).toMatchObject({
      granted: false,
      reason: 'OUTSIDE_SCHEDULED_TIME',
      message: 'Access denied: Outside of scheduled time (current: 10:01)',
    });
  });

  it('denies before the window opens', async () => {
    const early = await access.decide('RFID-001', '203', MON('07:59:59'));
    expect(early.reason).toBe('OUTSIDE_SCHEDULED_TIME');
    expect(early.reasonText).toBe('Outside of scheduled time (current: 07:59)');
  });

  it('only considers windows of the current semester', async () => {
    await moduleRef.get(TermsService).updateCurrentTerm('2025-2026', '2nd', new Date());

    const d = await access.decide('RFID-001', '203', MON('09:00:00'));
    expect(d.reasonText).toBe('No schedule for Monday in 2nd semester');

    const row = await txRepo.findOneByOrFail({ id: d.transactionId ?? -1 });
    expect(row.semester).toBe('2nd');
  });

  it('logs a denial for a deactivated credential', async () => {
    await ds.getRepository(CredentialEntity).update({ id: seeded.credential.id }, { isActive: false });

    const d = await access.decide('RFID-001', '203', MON('09:00:00'));

    expect(d).toMatchObject({
      granted: false,
      reason: 'CREDENTIAL_INACTIVE',
      message: 'Access denied: This card has been deactivated',
    });
    expect(await txRepo.countBy({ accessGranted: false, denialCode: 'CREDENTIAL_INACTIVE' })).toBe(1);
  });

  it('logs a denial for an inactive room', async () => {
    await ds.getRepository(RoomEntity).update({ id: seeded.room.id }, { isActive: false });

    const d = await access.decide('RFID-001', '203', MON('09:00:00'));

    expect(d.reason).toBe('ROOM_INACTIVE');
    expect(d.reasonText).toBe('Room 203 is currently inactive');
    expect(await txRepo.count()).toBe(1);
  });

  it('denies a badge presented at a room it is not registered for', async () => {
    await ds.getRepository(RoomEntity).save({ code: '204' });

    const d = await access.decide('RFID-001', '204', MON('09:00:00'));

    expect(d.reason).toBe('CREDENTIAL_ROOM_MISMATCH');
    expect(d.reasonText).toBe('This card is not registered for room 204');
    expect(await txRepo.countBy({ roomCode: '204', accessGranted: false })).toBe(1);
  });

  it('does not write a row for an unknown badge', async () => {
    const d = await access.decide('NOPE', '203', MON('09:00:00'));

    expect(d).toMatchObject({
      granted: false,
      reason: 'CREDENTIAL_UNKNOWN',
      message: 'RFID card not registered',
      transactionId: null,
    });
    expect(await txRepo.count()).toBe(0);
  });

  it('does not write a row for an unknown room', async () => {
    const d = await access.decide('RFID-001', '999', MON('09:00:00'));

    expect(d).toMatchObject({
      granted: false,
      reason: 'ROOM_UNKNOWN',
      facultyName: 'Ana Cruz',
      message: 'Room 999 not found in system',
    });
    expect(await txRepo.count()).toBe(0);
  });

  it('uses the lowest window id when windows overlap', async () => {
    const windows = ds.getRepository(ScheduleWindowEntity);
    await windows.save(
      windows.create({
        roomId: seeded.room.id,
        semester: '1st',
        days: ['monday'],
        startTime: '09:00',
        endTime: '11:00',
        facultyId: seeded.faculty.id,
      }),
    );

    const d = await access.decide('RFID-001', '203', MON('09:30:00'));
    expect(d.windowId).toBe(seeded.window.id);
  });
});
