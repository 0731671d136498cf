import { Column, Entity, PrimaryColumn } from 'typeorm';
import type { Semester } from '../schedules/weekday';

export const TERM_ROW_ID = 1;

/**
 * The one live (academic year, semester) record. Only row id=1 exists;
 * it is created on first read and never deleted.
 */
@Entity({ name: 'term_entity' })
export class TermEntity {
  @PrimaryColumn({ type: 'integer' })
  id!: number;

  // "2025-2026"
  @Column({ type: 'varchar', length: 20, default: '2025-2026' })
  academicYear!: string;

  @Column({ type: 'varchar', length: 10, default: '1st' })
  semester!: Semester;

  // Written by the service from the application clock, with milliseconds.
  @Column({ type: Date, default: () => 'CURRENT_TIMESTAMP' })
  updatedAt!: Date;
}
