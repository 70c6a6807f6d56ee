import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Unique } from 'typeorm';
import { SubjectEntity } from './subject.entity';

@Entity('subject_components')
@Unique(['subjectId', 'name'])
export class SubjectComponentEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column({ type: 'uuid' }) subjectId!: string;
  @ManyToOne(() => SubjectEntity, (s) => s.components, { onDelete: 'CASCADE' }) @JoinColumn({ name: 'subjectId' }) subject!: SubjectEntity;
  @Column({ length: 100 }) name!: string;
  @Column({ type: 'numeric', precision: 11, scale: 10 }) weight!: string; // fraction, siblings sum to 1 within 1e-6
  @Column({ type: 'int', default: 100 }) maxRawScore!: number;
  @Column({ type: 'int', default: 0 }) position!: number;
}
