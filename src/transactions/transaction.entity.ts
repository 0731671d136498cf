import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import type { Semester } from '../schedules/weekday';

export type TransactionSource = 'live' | 'offline';

/**
 * One key session (open -> close) or one denied attempt.
 *
 * credentialId/roomId are plain ids without foreign keys so that rows
 * survive deletion of the credential or room; facultyName, roomCode and
 * badgeCode are a snapshot taken at insert and never recomputed.
 *
 * At most one granted row with closeTime NULL may exist per
 * (credential, room, term): "the key is currently out".
 */
@Entity({ name: 'transaction_entity' })
@Index(
  'uq_transaction_open_session',
  ['credentialId', 'roomId', 'academicYear', 'semester'],
  { unique: true, where: '"closeTime" IS NULL AND "accessGranted" = true' },
)
@Index(['academicYear', 'semester', 'openTime'])
export class TransactionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer', nullable: true })
  credentialId!: number | null;

  @Column({ type: 'integer', nullable: true })
  roomId!: number | null;

  @Column({ type: 'varchar', length: 150, default: '' })
  facultyName!: string;

  @Column({ type: 'varchar', length: 10, default: '' })
  roomCode!: string;

  @Column({ type: 'varchar', length: 50, default: '' })
  badgeCode!: string;

  @Column({ type: 'varchar', length: 20 })
  academicYear!: string;

  @Column({ type: 'varchar', length: 10 })
  semester!: Semester;

  @Column({ type: Date })
  openTime!: Date;

  @Column({ type: Date, nullable: true })
  closeTime!: Date | null;

  @Column({ type: 'boolean', default: true })
  accessGranted!: boolean;

  @Column({ type: 'varchar', length: 40, nullable: true })
  denialCode!: string | null;

  @Column({ type: 'varchar', length: 200, nullable: true })
  denialReason!: string | null;

  @Column({ type: 'integer', nullable: true })
  scheduleWindowId!: number | null;

  @Column({ type: 'varchar', length: 10, default: 'live' })
  source!: TransactionSource;
}
