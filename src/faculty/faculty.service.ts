import { BadRequestException, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';

import { DEPARTMENTS, Department, FacultyEntity } from './faculty.entity';

function isDepartment(v: string): v is Department {
  return (DEPARTMENTS as readonly string[]).includes(v);
}

@Injectable()
export class FacultyService {
  constructor(
    @InjectRepository(FacultyEntity)
    private readonly facultyRepo: Repository<FacultyEntity>,
  ) {}

  async create(schoolId: string, fullName: string, department = 'COE') {
    const sid = String(schoolId ?? '').trim();
    const dept = String(department ?? '').trim().toUpperCase();

    if (!sid) throw new BadRequestException('schoolId is required.');
    if (!isDepartment(dept)) {
      throw new BadRequestException(`department must be one of: ${DEPARTMENTS.join(', ')}.`);
    }

    const exists = await this.facultyRepo.findOne({ where: { schoolId: sid } });
    if (exists) throw new BadRequestException('A faculty member with this school id already exists.');

    return this.facultyRepo.save(
      this.facultyRepo.create({ schoolId: sid, fullName: String(fullName ?? '').trim(), department: dept }),
    );
  }

  async namesByIds(ids: number[]) {
    const unique = Array.from(new Set(ids));
    if (unique.length === 0) return new Map<number, string>();

    const rows = await this.facultyRepo.find({ where: { id: In(unique) } });
    return new Map(rows.map((f) => [f.id, f.fullName]));
  }
}
