import { TestingModule } from '@nestjs/testing';
import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';

import { CredentialsService } from './credentials.service';
import { FacultyService } from './faculty.service';
import { FacultyModule } from './faculty.module';
import { RoomEntity } from '../rooms/room.entity';
import { createKeyboxTestingModule } from '../testing/keybox-testing';

describe('CredentialsService', () => {
  let moduleRef: TestingModule;
  let credentials: CredentialsService;
  let faculty: FacultyService;
  let room: RoomEntity;

  beforeEach(async () => {
    moduleRef = await createKeyboxTestingModule({ imports: [FacultyModule] });
    credentials = moduleRef.get(CredentialsService);
    faculty = moduleRef.get(FacultyService);
    room = await moduleRef.get(DataSource).getRepository(RoomEntity).save({ code: '203' });
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('resolves a badge to its credential and faculty member', async () => {
    const f = await faculty.create('F-001', 'Ana Cruz', 'ccis');
    await credentials.register(' RFID-001 ', f.id, room.id);

    const resolved = await credentials.resolve('RFID-001');

    expect(resolved?.credential).toMatchObject({ badgeCode: 'RFID-001', roomId: room.id, isActive: true });
    expect(resolved?.faculty).toMatchObject({ fullName: 'Ana Cruz', department: 'CCIS' });
    expect(await credentials.resolve('RFID-404')).toBeNull();
    expect(await credentials.resolve('')).toBeNull();
  });

  it('resolves deactivated badges too', async () => {
    const f = await faculty.create('F-001', 'Ana Cruz');
    const c = await credentials.register('RFID-001', f.id, room.id);
    await credentials.setActive(c.id, false);

    expect((await credentials.resolve('RFID-001'))?.credential.isActive).toBe(false);
    expect(await credentials.activeBadgeCodes(f.id, room.id)).toEqual([]);
  });

  it('lists active badges in registration order', async () => {
    const f = await faculty.create('F-001', 'Ana Cruz');
    await credentials.register('RFID-B', f.id, room.id);
    await credentials.register('RFID-A', f.id, room.id);

    expect(await credentials.activeBadgeCodes(f.id, room.id)).toEqual(['RFID-B', 'RFID-A']);
  });

  it('rejects empty, duplicate and dangling registrations', async () => {
    const f = await faculty.create('F-001', 'Ana Cruz');
    await credentials.register('RFID-001', f.id, room.id);

    await expect(credentials.register('  ', f.id, room.id)).rejects.toBeInstanceOf(BadRequestException);
    await expect(credentials.register('RFID-001', f.id, room.id)).rejects.toBeInstanceOf(ConflictException);
    await expect(credentials.register('RFID-002', f.id + 1, room.id)).rejects.toBeInstanceOf(NotFoundException);
    await expect(credentials.register('RFID-002', f.id, room.id + 1)).rejects.toBeInstanceOf(NotFoundException);
  });

  it('maps faculty ids to names', async () => {
    const a = await faculty.create('F-001', 'Ana Cruz');
    const b = await faculty.create('F-002', 'Ben Reyes');

    const names = await faculty.namesByIds([a.id, b.id, a.id]);
    expect(names.size).toBe(2);
    expect(names.get(a.id)).toBe('Ana Cruz');
    expect(names.get(b.id)).toBe('Ben Reyes');
  });
});
