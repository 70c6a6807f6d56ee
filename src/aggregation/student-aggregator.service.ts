import { Injectable } from '@nestjs/common';
import {
  AggregationSettings,
  Grade,
  isMissingMark,
  MissingMark,
  RawMark,
  StudentRef,
  StudentResult,
  Subject,
  SubjectScore,
} from '../common/types/performance.types';
import { InvalidSubjectScaleException, UnknownSystemException } from '../common/exceptions/performance.exceptions';
import { mean, roundScore } from '../common/utils/rounding.util';
import { GradingVocabulary } from '../grading/grading-vocabulary';
import { MarkBook, MarkNormalizer } from '../marks/mark-normalizer.service';
import { isPositiveScale, ResolvedSubject, SubjectModelResolver } from '../subjects/subject-model.resolver';

export interface AggregationContext {
  termId: string;
  assessmentType: string;
  subjects: readonly Subject[];
  vocabulary: GradingVocabulary;
  settings: AggregationSettings;
}

export interface AggregateRequest extends AggregationContext {
  student: StudentRef;
  marks: MarkBook | readonly RawMark[];
}

export interface AggregateCohortRequest extends AggregationContext {
  students: readonly StudentRef[];
  marks: MarkBook | readonly RawMark[];
}

@Injectable()
export class StudentAggregator {
  constructor(
    private readonly resolver: SubjectModelResolver,
    private readonly normalizer: MarkNormalizer,
  ) {}

  aggregate(request: AggregateRequest): StudentResult {
    this.assertSettings(request.vocabulary, request.settings);
    const resolved = this.resolver.resolveAll(request.subjects);
    return this.aggregateStudent(request.student, resolved, this.toBook(request.marks), request);
  }

  /** Same subjects, settings and snapshot for every student; subjects are resolved once. */
  aggregateCohort(request: AggregateCohortRequest): StudentResult[] {
    this.assertSettings(request.vocabulary, request.settings);
    const resolved = this.resolver.resolveAll(request.subjects);
    const book = this.toBook(request.marks);
    return request.students.map((student) => this.aggregateStudent(student, resolved, book, request));
  }

  private aggregateStudent(
    student: StudentRef,
    resolved: readonly ResolvedSubject[],
    book: MarkBook,
    context: AggregationContext,
  ): StudentResult {
    const { vocabulary, settings } = context;

    const subjects: SubjectScore[] = resolved.map((entry) => {
      const normalized = this.normalizer.normalizeResolved(student.id, entry, book);
      return {
        subjectId: entry.subject.id,
        subjectName: entry.subject.name,
        percentage: normalized.percentage,
        grade: isMissingMark(normalized.percentage)
          ? null
          : vocabulary.gradeFor(normalized.percentage, settings.activeSystem),
        components: normalized.components,
      };
    });

    // Subjects without any mark stay out of both the total and the average.
    let total = 0;
    const percentages: number[] = [];
    resolved.forEach((entry, i) => {
      const percentage = subjects[i].percentage;
      if (isMissingMark(percentage)) return;
      percentages.push(percentage);
      total += (percentage / 100) * (entry.subject.maxScale ?? settings.subjectMaxScale);
    });

    const average = mean(percentages);
    const averagePercentage = average === null ? MissingMark : roundScore(average);
    const overall = isMissingMark(averagePercentage)
      ? null
      : vocabulary.gradeFor(averagePercentage, settings.activeSystem);

    const additionalGrades: Record<string, Grade> = {};
    if (!isMissingMark(averagePercentage)) {
      for (const systemId of settings.secondarySystems) {
        additionalGrades[systemId] = vocabulary.gradeFor(averagePercentage, systemId);
      }
    }

    return {
      studentId: student.id,
      studentName: student.name,
      ...(student.streamId !== undefined ? { streamId: student.streamId } : {}),
      termId: context.termId,
      assessmentType: context.assessmentType,
      subjects,
      totalScore: roundScore(total),
      averagePercentage,
      overallGrade: overall ? overall.label : null,
      overallPoints: overall ? overall.points : null,
      additionalGrades,
      rank: null,
    };
  }

  private toBook(marks: MarkBook | readonly RawMark[]): MarkBook {
    return marks instanceof MarkBook ? marks : this.normalizer.index(marks);
  }

  private assertSettings(vocabulary: GradingVocabulary, settings: AggregationSettings) {
    if (!isPositiveScale(settings.subjectMaxScale)) {
      throw new InvalidSubjectScaleException('default', settings.subjectMaxScale);
    }
    for (const systemId of [settings.activeSystem, ...settings.secondarySystems]) {
      if (!vocabulary.has(systemId)) throw new UnknownSystemException(systemId);
    }
  }
}
