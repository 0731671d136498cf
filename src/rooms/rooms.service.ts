import { BadRequestException, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';

import { RoomEntity } from './room.entity';

@Injectable()
export class RoomsService {
  constructor(
    @InjectRepository(RoomEntity)
    private readonly roomRepo: Repository<RoomEntity>,
  ) {}

  private normalizeCode(code: string) {
    return String(code ?? '').trim();
  }

  async create(code: string, description = '') {
    const c = this.normalizeCode(code);
    if (!c || c.length > 10) {
      throw new BadRequestException('Room code is required (max 10 characters).');
    }

    const room = this.roomRepo.create({ code: c, description: description.trim() });
    return this.roomRepo.save(room);
  }

  /** Any room with this code, active or not. */
  async findByCode(code: string) {
    const c = this.normalizeCode(code);
    if (!c) return null;
    return this.roomRepo.findOne({ where: { code: c } });
  }

  async findActiveByCode(code: string) {
    const room = await this.findByCode(code);
    return room?.isActive ? room : null;
  }

  async findById(id: number) {
    return this.roomRepo.findOne({ where: { id } });
  }

  async findByIds(ids: number[]) {
    if (ids.length === 0) return [];
    return this.roomRepo.find({ where: { id: In(ids) } });
  }

  async setActive(id: number, isActive: boolean) {
    await this.roomRepo.update({ id }, { isActive });
  }
}
