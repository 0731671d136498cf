import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

/**
 * ESP32 door controller. Online/offline is derived from lastHeartbeat on
 * every read and never stored.
 */
@Entity({ name: 'device_entity' })
export class DeviceEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  // e.g. "ESP32-1"
  @Column({ type: 'varchar', length: 50, unique: true })
  deviceName!: string;

  // hardware id (MAC)
  @Column({ type: 'varchar', length: 100, unique: true })
  deviceId!: string;

  @Column({ type: 'integer', nullable: true })
  roomId!: number | null;

  @Column({ type: 'varchar', length: 45, nullable: true })
  ipAddress!: string | null;

  @Column({ type: Date, nullable: true })
  lastHeartbeat!: Date | null;

  @Column({ type: 'varchar', length: 20, default: '' })
  firmwareVersion!: string;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
