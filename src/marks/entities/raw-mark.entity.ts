import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Unique, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { StudentEntity } from './student.entity';
import { SubjectEntity } from '../../subjects/entities/subject.entity';
import { SubjectComponentEntity } from '../../subjects/entities/subject-component.entity';

// A mark is entered either against an atomic subject or against one component of a composite.
@Entity('raw_marks')
@Unique(['studentId', 'subjectId', 'componentId', 'termId', 'assessmentType'])
export class RawMarkEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column({ type: 'uuid' }) studentId!: string;
  @ManyToOne(() => StudentEntity, { onDelete: 'CASCADE' }) @JoinColumn({ name: 'studentId' }) student!: StudentEntity;
  @Column({ type: 'uuid', nullable: true }) subjectId!: string | null;
  @ManyToOne(() => SubjectEntity, { onDelete: 'CASCADE', nullable: true }) @JoinColumn({ name: 'subjectId' }) subject!: SubjectEntity | null;
  @Column({ type: 'uuid', nullable: true }) componentId!: string | null;
  @ManyToOne(() => SubjectComponentEntity, { onDelete: 'CASCADE', nullable: true }) @JoinColumn({ name: 'componentId' }) component!: SubjectComponentEntity | null;
  @Column({ type: 'uuid' }) termId!: string;
  @Column({ length: 30 }) assessmentType!: string; // End Term, Mid Term, CAT 1...
  @Column({ type: 'decimal', precision: 7, scale: 2 }) rawScore!: string; // store as string for precision
  @Column({ type: 'int', nullable: true }) maxRawScore!: number | null; // null => component's configured scale
  @CreateDateColumn() createdAt!: Date;
  @UpdateDateColumn() updatedAt!: Date;
}
