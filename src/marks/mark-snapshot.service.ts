import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, In, Repository } from 'typeorm';
import { RawMarkEntity } from './entities/raw-mark.entity';
import { StudentEntity } from './entities/student.entity';
import { CohortQuery, MarkSource } from '../common/sources/performance-sources';
import { RawMark, StudentRef } from '../common/types/performance.types';

export const DEFAULT_MAX_RAW_SCORE = 100;

@Injectable()
export class MarkSnapshotService implements MarkSource {
  private readonly logger = new Logger(MarkSnapshotService.name);

  constructor(
    @InjectRepository(StudentEntity) private readonly studentRepo: Repository<StudentEntity>,
    @InjectRepository(RawMarkEntity) private readonly markRepo: Repository<RawMarkEntity>,
  ) {}

  async findCohortStudents(cohort: CohortQuery): Promise<StudentRef[]> {
    const where: FindOptionsWhere<StudentEntity> = { gradeId: cohort.gradeId, isActive: true };
    if (cohort.streamId) where.streamId = cohort.streamId;

    const students = await this.studentRepo.find({ where, order: { lastName: 'ASC', firstName: 'ASC' } });
    return students.map((s) => ({
      id: s.id,
      name: `${s.firstName} ${s.lastName}`,
      ...(s.streamId ? { streamId: s.streamId } : {}),
    }));
  }

  async findMarks(studentIds: readonly string[], termId: string, assessmentType: string): Promise<RawMark[]> {
    if (studentIds.length === 0) return [];

    const rows = await this.markRepo.find({
      where: { studentId: In([...studentIds]), termId, assessmentType },
      relations: ['component'],
    });

    const marks: RawMark[] = [];
    for (const row of rows) {
      const target = row.componentId ?? row.subjectId;
      if (!target) {
        this.logger.warn(`Mark ${row.id} has neither subject nor component, skipped`);
        continue;
      }
      marks.push({
        studentId: row.studentId,
        subjectOrComponentId: target,
        rawScore: parseFloat(row.rawScore),
        maxRawScore: row.maxRawScore ?? row.component?.maxRawScore ?? DEFAULT_MAX_RAW_SCORE,
      });
    }
    return marks;
  }
}
