import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';

import { COMMAND_ACTIONS, CommandAction, ManualCommandEntity } from './manual-command.entity';
import { RoomsService } from '../rooms/rooms.service';
import { COMMAND_RECENCY_WINDOW_MS } from '../config/keybox.config';
import type { StaffUser } from '../auth/staff-user';

function isCommandAction(v: unknown): v is CommandAction {
  return COMMAND_ACTIONS.some((a) => a === v);
}

export type PolledCommand = {
  action: CommandAction;
  issuedAt: Date;
  staffName: string;
};

/**
 * Staff-issued open/close commands. Controllers poll for them; nothing is
 * acknowledged, so the same command may be delivered more than once.
 */
@Injectable()
export class CommandsService {
  private readonly logger = new Logger(CommandsService.name);

  constructor(
    @InjectRepository(ManualCommandEntity)
    private readonly commandRepo: Repository<ManualCommandEntity>,
    private readonly rooms: RoomsService,
  ) {}

  async issueCommand(roomId: number, staff: StaffUser, action: string, notes: string, now: Date) {
    const a = String(action ?? '').trim().toLowerCase();
    if (!isCommandAction(a)) {
      throw new BadRequestException(`Invalid action. Use: ${COMMAND_ACTIONS.join(', ')}.`);
    }

    const room = await this.rooms.findById(roomId);
    if (!room?.isActive) throw new NotFoundException('Room not found or inactive.');

    const saved = await this.commandRepo.save(
      this.commandRepo.create({
        roomId: room.id,
        staffId: staff.id,
        staffName: staff.name,
        action: a,
        notes: String(notes ?? '').trim(),
        issuedAt: now,
      }),
    );

    this.logger.log(`Manual ${a} for room ${room.code} by ${staff.name}`);
    return { command: saved, roomCode: room.code };
  }

  /** Latest command for the room, if it was issued within the recency window. */
  async pollCommands(roomCode: string, now: Date): Promise<PolledCommand | null> {
    const room = await this.rooms.findByCode(roomCode);
    if (!room) return null;

    const latest = await this.commandRepo.findOne({
      where: { roomId: room.id },
      order: { issuedAt: 'DESC', id: 'DESC' },
    });
    if (!latest) return null;

    if (now.getTime() - latest.issuedAt.getTime() > COMMAND_RECENCY_WINDOW_MS) return null;

    return { action: latest.action, issuedAt: latest.issuedAt, staffName: latest.staffName };
  }

  async recentCommands(limit = 20) {
    const take = Math.min(Math.max(Math.trunc(limit) || 20, 1), 100);
    const rows = await this.commandRepo.find({
      order: { issuedAt: 'DESC', id: 'DESC' },
      take,
    });

    const rooms = await this.rooms.findByIds([...new Set(rows.map((r) => r.roomId))]);
    const codes = new Map(rooms.map((r) => [r.id, r.code]));

    return rows.map((r) => ({
      id: r.id,
      roomCode: codes.get(r.roomId) ?? null,
      action: r.action,
      staffName: r.staffName,
      notes: r.notes,
      issuedAt: r.issuedAt.toISOString(),
    }));
  }
}
