import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import type { Semester, Weekday } from './weekday';

/**
 * Weekly recurring time range in which the assigned faculty may take the
 * key of a room. Several days on one row mean "the same hours on each of
 * these days".
 */
@Entity({ name: 'schedule_window_entity' })
@Index(['roomId', 'semester', 'facultyId'])
export class ScheduleWindowEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  roomId!: number;

  @Column({ type: 'varchar', length: 10, default: '1st' })
  semester!: Semester;

  // Normalized names only ("monday", ...); never empty.
  @Column({ type: 'simple-array' })
  days!: Weekday[];

  // "HH:MM"
  @Column({ type: 'varchar', length: 5 })
  startTime!: string;

  @Column({ type: 'varchar', length: 5 })
  endTime!: string;

  @Column({ type: 'varchar', length: 100, default: '' })
  subject!: string;

  @Column({ type: 'varchar', length: 100, default: '' })
  instructorName!: string;

  // null = display-only row, never grants access
  @Column({ type: 'integer', nullable: true })
  facultyId!: number | null;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  // Stamped by SchedulesService on every write; check-updates compares it.
  @Column({ type: Date, default: () => 'CURRENT_TIMESTAMP' })
  updatedAt!: Date;
}
