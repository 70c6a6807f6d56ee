import { Entity, PrimaryGeneratedColumn, Column, OneToMany, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import { SubjectComponentEntity } from './subject-component.entity';

@Entity('subjects')
@Index(['educationLevel', 'name'], { unique: true })
export class SubjectEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 100 })
  name!: string;

  // lower_primary, upper_primary, junior_secondary
  @Column({ length: 50 })
  educationLevel!: string;

  @Column({ default: false })
  isComposite!: boolean;

  // scale the subject adds to a student's total; null => assessment default
  @Column({ type: 'int', nullable: true })
  maxScale!: number | null;

  @Column({ type: 'int', default: 0 })
  position!: number;

  @Column({ default: true })
  isActive!: boolean;

  @OneToMany(() => SubjectComponentEntity, (c) => c.subject, { cascade: true, eager: true })
  components!: SubjectComponentEntity[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
