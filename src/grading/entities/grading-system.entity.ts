import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';

export interface StoredGradeBand {
  minPercentage: number;
  label: string;
  name: string;
  points: number;
}

// One grading vocabulary (CBC, letter grades...). Bands are kept as JSON, any order.
@Entity('grading_systems')
export class GradingSystemEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // e.g. CBC, PERCENTAGE
  @Index({ unique: true })
  @Column({ length: 20 })
  code!: string;

  @Column({ length: 100 })
  name!: string;

  @Column({ type: 'jsonb' })
  bands!: StoredGradeBand[];

  @Column({ type: 'numeric', precision: 5, scale: 2, default: 50 })
  passMarkPercentage!: string;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
