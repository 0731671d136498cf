import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

export const COMMAND_ACTIONS = ['open', 'close'] as const;
export type CommandAction = (typeof COMMAND_ACTIONS)[number];

// Append-only; there is no "consumed" flag.
@Entity({ name: 'manual_command_entity' })
@Index(['roomId', 'issuedAt'])
export class ManualCommandEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  roomId!: number;

  @Column({ type: 'varchar', length: 100, nullable: true })
  staffId!: string | null;

  @Column({ type: 'varchar', length: 150, default: '' })
  staffName!: string;

  @Column({ type: 'varchar', length: 10 })
  action!: CommandAction;

  @Column({ type: 'text', default: '' })
  notes!: string;

  @Column({ type: Date })
  issuedAt!: Date;
}
