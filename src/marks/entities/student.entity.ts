import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

// Read-only view of the roster; the wider application owns writes.
@Entity('students')
@Index(['gradeId', 'streamId'])
export class StudentEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 30, unique: true })
  admissionNumber!: string;

  @Column({ length: 100 })
  firstName!: string;

  @Column({ length: 100 })
  lastName!: string;

  @Column({ type: 'uuid' })
  gradeId!: string;

  @Column({ type: 'uuid', nullable: true })
  streamId!: string | null;

  @Column({ default: true })
  isActive!: boolean;
}
