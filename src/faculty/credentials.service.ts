import {
  BadRequestException,
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';

import { CredentialEntity } from './credential.entity';
import { FacultyEntity } from './faculty.entity';
import { RoomEntity } from '../rooms/room.entity';

export type ResolvedCredential = {
  credential: CredentialEntity;
  faculty: FacultyEntity;
};

/**
 * Badge directory: badge code -> (faculty, room).
 */
@Injectable()
export class CredentialsService {
  constructor(
    @InjectRepository(CredentialEntity)
    private readonly credentialRepo: Repository<CredentialEntity>,

    @InjectRepository(FacultyEntity)
    private readonly facultyRepo: Repository<FacultyEntity>,

    @InjectRepository(RoomEntity)
    private readonly roomRepo: Repository<RoomEntity>,
  ) {}

  private normalizeBadge(code: string) {
    return String(code ?? '').trim();
  }

  /** Looks a badge up regardless of its active flag; null when unknown. */
  async resolve(badgeCode: string): Promise<ResolvedCredential | null> {
    const code = this.normalizeBadge(badgeCode);
    if (!code) return null;

    const credential = await this.credentialRepo.findOne({ where: { badgeCode: code } });
    if (!credential) return null;

    const faculty = await this.facultyRepo.findOne({ where: { id: credential.facultyId } });
    if (!faculty) return null;

    return { credential, faculty };
  }

  async activeBadgeCodes(facultyId: number, roomId: number): Promise<string[]> {
    const rows = await this.credentialRepo.find({
      where: { facultyId, roomId, isActive: true },
      order: { id: 'ASC' },
    });
    return rows.map((c) => c.badgeCode);
  }

  async register(badgeCode: string, facultyId: number, roomId: number) {
    const code = this.normalizeBadge(badgeCode);
    if (!code) throw new BadRequestException('Badge code is required.');

    const [faculty, room] = await Promise.all([
      this.facultyRepo.findOne({ where: { id: facultyId } }),
      this.roomRepo.findOne({ where: { id: roomId } }),
    ]);
    if (!faculty) throw new NotFoundException('Faculty not found.');
    if (!room) throw new NotFoundException('Room not found.');

    const taken = await this.credentialRepo.findOne({ where: { badgeCode: code } });
    if (taken) {
      throw new ConflictException(`Badge ${code} is already registered.`);
    }

    return this.credentialRepo.save(this.credentialRepo.create({ badgeCode: code, facultyId, roomId }));
  }

  async setActive(id: number, isActive: boolean) {
    await this.credentialRepo.update({ id }, { isActive });
  }
}
