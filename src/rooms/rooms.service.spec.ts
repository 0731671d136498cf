import { TestingModule } from '@nestjs/testing';
import { BadRequestException } from '@nestjs/common';

import { RoomsService } from './rooms.service';
import { RoomsModule } from './rooms.module';
import { createKeyboxTestingModule } from '../testing/keybox-testing';

describe('RoomsService', () => {
  let moduleRef: TestingModule;
  let rooms: RoomsService;

  beforeEach(async () => {
    moduleRef = await createKeyboxTestingModule({ imports: [RoomsModule] });
    rooms = moduleRef.get(RoomsService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('creates rooms and finds them by trimmed code', async () => {
    const room = await rooms.create(' 205 ', ' Electronics Lab ');

    expect(room).toMatchObject({ code: '205', description: 'Electronics Lab' });
    expect((await rooms.findByCode('205 '))?.id).toBe(room.id);
    expect(await rooms.findByCode('')).toBeNull();
  });

  it('hides inactive rooms from the active lookup only', async () => {
    const room = await rooms.create('205');
    await rooms.setActive(room.id, false);

    expect(await rooms.findActiveByCode('205')).toBeNull();
    expect((await rooms.findByCode('205'))?.isActive).toBe(false);
  });

  it('rejects empty and overlong codes', async () => {
    await expect(rooms.create('  ')).rejects.toBeInstanceOf(BadRequestException);
    await expect(rooms.create('ROOM-12345X')).rejects.toBeInstanceOf(BadRequestException);
  });

  it('loads several rooms at once', async () => {
    const a = await rooms.create('203');
    const b = await rooms.create('204');

    const found = await rooms.findByIds([a.id, b.id]);
    expect(found.map((r) => r.code).sort()).toEqual(['203', '204']);
    expect(await rooms.findByIds([])).toEqual([]);
  });
});
