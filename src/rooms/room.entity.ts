import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

/**
 * Laboratory room (203, 204, 205, ...) whose key sits in a keybox.
 */
@Entity({ name: 'room_entity' })
export class RoomEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 10, unique: true })
  code!: string;

  @Column({ type: 'varchar', length: 100, default: '' })
  description!: string;

  // Inactive rooms deny every swipe but keep their history.
  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  /**
   * Bumped when windows of this room are removed or replaced, so that
   * controllers notice deletions (a deleted row has no updatedAt to compare).
   */
  @Column({ type: Date, nullable: true })
  schedulesRevisedAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
