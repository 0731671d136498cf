import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

export const DEPARTMENTS = ['COE', 'CCIS', 'CBT', 'CAS', 'CTE'] as const;
export type Department = (typeof DEPARTMENTS)[number];

@Entity({ name: 'faculty_entity' })
export class FacultyEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  // School RFID or employee id
  @Column({ type: 'varchar', length: 50, unique: true })
  schoolId!: string;

  @Column({ type: 'varchar', length: 150, default: '' })
  fullName!: string;

  @Column({ type: 'varchar', length: 10, default: 'COE' })
  department!: Department;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;
}
