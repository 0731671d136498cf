import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';

/**
 * Keybox badge registration: one badge code binds one (faculty, room) pair.
 * A faculty member with keys to N rooms holds N credentials.
 */
@Entity({ name: 'credential_entity' })
@Index(['facultyId', 'roomId'])
export class CredentialEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 50, unique: true })
  badgeCode!: string;

  @Column({ type: 'integer' })
  facultyId!: number;

  @Column({ type: 'integer' })
  roomId!: number;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;
}
