import { TestingModule } from '@nestjs/testing';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';

import { CommandsService } from './commands.service';
import { CommandsModule } from './commands.module';
import { RoomEntity } from '../rooms/room.entity';
import type { StaffUser } from '../auth/staff-user';
import { createKeyboxTestingModule } from '../testing/keybox-testing';

const STAFF: StaffUser = { id: 'staff-1', name: 'Desk Officer', role: 'staff' };
const NOW = new Date('2025-09-01T08:00:00Z');
const later = (ms: number) => new Date(NOW.getTime() + ms);

describe('CommandsService', () => {
  let moduleRef: TestingModule;
  let commands: CommandsService;
  let room: RoomEntity;

  beforeEach(async () => {
    moduleRef = await createKeyboxTestingModule({ imports: [CommandsModule] });
    commands = moduleRef.get(CommandsService);
    room = await moduleRef.get(DataSource).getRepository(RoomEntity).save({ code: '205' });
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('delivers a command polled inside the recency window', async () => {
    await commands.issueCommand(room.id, STAFF, 'open', 'locked out', NOW);

    await expect(commands.pollCommands('205', later(3_000))).resolves.toEqual({
      action: 'open',
      issuedAt: NOW,
      staffName: 'Desk Officer',
    });
    expect((await commands.pollCommands('205', later(5_000)))?.action).toBe('open');
  });

  it('returns nothing once the window has passed', async () => {
    await commands.issueCommand(room.id, STAFF, 'open', '', NOW);

    await expect(commands.pollCommands('205', later(5_001))).resolves.toBeNull();
  });

  it('keeps delivering the same command on repeated polls', async () => {
    await commands.issueCommand(room.id, STAFF, 'close', '', NOW);

    const first = await commands.pollCommands('205', later(1_000));
    const second = await commands.pollCommands('205', later(2_000));

    expect(first).toEqual(second);
  });

  it('prefers the latest command', async () => {
    await commands.issueCommand(room.id, STAFF, 'open', '', NOW);
    await commands.issueCommand(room.id, STAFF, 'close', '', later(1_000));

    expect((await commands.pollCommands('205', later(2_000)))?.action).toBe('close');
  });

  it('returns nothing for rooms without commands or unknown rooms', async () => {
    await expect(commands.pollCommands('205', NOW)).resolves.toBeNull();
    await expect(commands.pollCommands('999', NOW)).resolves.toBeNull();
  });

  it('validates the action and the room', async () => {
    await expect(commands.issueCommand(room.id, STAFF, 'explode', '', NOW)).rejects.toBeInstanceOf(
      BadRequestException,
    );
    await expect(commands.issueCommand(room.id + 100, STAFF, 'open', '', NOW)).rejects.toBeInstanceOf(
      NotFoundException,
    );

    await moduleRef.get(DataSource).getRepository(RoomEntity).update({ id: room.id }, { isActive: false });
    await expect(commands.issueCommand(room.id, STAFF, 'open', '', NOW)).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  it('lists recent commands newest first', async () => {
    await commands.issueCommand(room.id, STAFF, ' OPEN ', 'first', NOW);
    await commands.issueCommand(room.id, STAFF, 'close', 'second', later(60_000));

    const recent = await commands.recentCommands(10);

    expect(recent.map((c) => [c.action, c.notes, c.roomCode])).toEqual([
      ['close', 'second', '205'],
      ['open', 'first', '205'],
    ]);
    expect(recent[0].issuedAt).toBe('2025-09-01T08:01:00.000Z');
  });
});
