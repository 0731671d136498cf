import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';

import { TERM_ROW_ID, TermEntity } from './term.entity';
import { CurrentTerm, TermSource } from './term-source';
import { isSemester } from '../schedules/weekday';

const ACADEMIC_YEAR_RE = /^(\d{4})-(\d{4})$/;

@Injectable()
export class TermsService implements TermSource {
  private readonly logger = new Logger(TermsService.name);

  constructor(
    @InjectRepository(TermEntity)
    private readonly termRepo: Repository<TermEntity>,
  ) {}

  private toCurrent(row: TermEntity): CurrentTerm {
    return {
      academicYear: row.academicYear,
      semester: row.semester,
      updatedAt: row.updatedAt,
    };
  }

  private async getOrCreate(now: Date) {
    const existing = await this.termRepo.findOne({ where: { id: TERM_ROW_ID } });
    if (existing) return existing;

    // insert-or-ignore: two first reads racing must both end up with row 1
    await this.termRepo
      .createQueryBuilder()
      .insert()
      .into(TermEntity)
      .values({ id: TERM_ROW_ID, updatedAt: now })
      .orIgnore()
      .execute();

    return this.termRepo.findOneOrFail({ where: { id: TERM_ROW_ID } });
  }

  async getCurrentTerm(): Promise<CurrentTerm> {
    return this.toCurrent(await this.getOrCreate(new Date()));
  }

  /**
   * Staff switches the system-wide term. Past transactions keep the term
   * they were written with.
   */
  async updateCurrentTerm(academicYear: string, semester: string, now: Date): Promise<CurrentTerm> {
    const ay = String(academicYear ?? '').trim();
    const sem = String(semester ?? '').trim().toLowerCase();

    const m = ACADEMIC_YEAR_RE.exec(ay);
    if (!m || Number(m[2]) !== Number(m[1]) + 1) {
      throw new BadRequestException('academicYear must look like "2025-2026" (consecutive years).');
    }
    if (!isSemester(sem)) {
      throw new BadRequestException('semester must be one of: 1st, 2nd, summer, summer2.');
    }

    const row = await this.getOrCreate(now);
    if (row.academicYear === ay && row.semester === sem) return this.toCurrent(row);

    await this.termRepo.update(
      { id: TERM_ROW_ID },
      { academicYear: ay, semester: sem, updatedAt: now },
    );
    this.logger.log(`Current term changed: ${row.semester} ${row.academicYear} -> ${sem} ${ay}`);

    return this.toCurrent(await this.termRepo.findOneOrFail({ where: { id: TERM_ROW_ID } }));
  }
}
