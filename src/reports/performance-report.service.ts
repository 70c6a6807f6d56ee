import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CohortQuery,
  GRADING_SOURCE,
  GradingConfigSource,
  MARK_SOURCE,
  MarkSource,
  SUBJECT_SOURCE,
  SubjectStructureSource,
} from '../common/sources/performance-sources';
import {
  AggregationSettings,
  RawMark,
  StreamResults,
  StudentRef,
  Subject,
} from '../common/types/performance.types';
import { InvalidSubjectScaleException } from '../common/exceptions/performance.exceptions';
import { ConfigService } from '../config/config.service';
import { GradingVocabulary } from '../grading/grading-vocabulary';
import { StudentAggregator } from '../aggregation/student-aggregator.service';
import { ClassRanker } from '../ranking/class-ranker.service';
import { CohortSummarizer } from '../analytics/cohort-summarizer.service';
import { isPositiveScale } from '../subjects/subject-model.resolver';
import { CohortReport, GradeQuery, GradeReport } from './dto/performance-report.dto';

export const UNASSIGNED_STREAM = 'unassigned';

interface Snapshot {
  students: StudentRef[];
  marks: RawMark[];
  subjects: Subject[];
  vocabulary: GradingVocabulary;
}

@Injectable()
export class PerformanceReportService {
  private readonly logger = new Logger(PerformanceReportService.name);

  constructor(
    @Inject(MARK_SOURCE) private readonly markSource: MarkSource,
    @Inject(SUBJECT_SOURCE) private readonly subjectSource: SubjectStructureSource,
    @Inject(GRADING_SOURCE) private readonly gradingSource: GradingConfigSource,
    private readonly aggregator: StudentAggregator,
    private readonly ranker: ClassRanker,
    private readonly summarizer: CohortSummarizer,
    private readonly configService: ConfigService,
  ) {}

  settings(overrides: Partial<AggregationSettings> = {}): AggregationSettings {
    const subjectMaxScale = overrides.subjectMaxScale ?? this.configService.getNumber('SUBJECT_MAX_SCALE', 100);
    if (!isPositiveScale(subjectMaxScale)) {
      throw new InvalidSubjectScaleException('default', subjectMaxScale);
    }
    return {
      activeSystem: overrides.activeSystem ?? this.configService.getOptional('GRADING_SYSTEM', 'CBC'),
      secondarySystems: overrides.secondarySystems ?? this.configService.getList('SECONDARY_GRADING_SYSTEMS'),
      subjectMaxScale,
    };
  }

  async buildCohortReport(query: CohortQuery, overrides?: Partial<AggregationSettings>): Promise<CohortReport> {
    return this.run(query, async () => {
      const settings = this.settings(overrides);
      const snapshot = await this.loadSnapshot(query);
      this.logger.debug(
        `Cohort ${query.gradeId}/${query.streamId ?? '*'} ${query.termId} ${query.assessmentType}: ` +
          `${snapshot.students.length} students, ${snapshot.marks.length} marks`,
      );

      const results = this.aggregator.aggregateCohort({
        students: snapshot.students,
        marks: snapshot.marks,
        subjects: snapshot.subjects,
        termId: query.termId,
        assessmentType: query.assessmentType,
        vocabulary: snapshot.vocabulary,
        settings,
      });
      const ranked = this.ranker.rank(results);
      const summary = this.summarizer.summarize(ranked, snapshot.subjects, { vocabulary: snapshot.vocabulary, settings });
      return { query, settings, results: ranked, summary };
    });
  }

  /** Every stream of a grade: stream positions, plus grade positions and statistics from the pooled students. */
  async buildGradeReport(query: GradeQuery, overrides?: Partial<AggregationSettings>): Promise<GradeReport> {
    return this.run(query, async () => {
      const settings = this.settings(overrides);
      const snapshot = await this.loadSnapshot(query);
      this.logger.debug(
        `Grade ${query.gradeId} ${query.termId} ${query.assessmentType}: ${snapshot.students.length} students`,
      );

      const results = this.aggregator.aggregateCohort({
        students: snapshot.students,
        marks: snapshot.marks,
        subjects: snapshot.subjects,
        termId: query.termId,
        assessmentType: query.assessmentType,
        vocabulary: snapshot.vocabulary,
        settings,
      });

      const byStream = new Map<string, typeof results>();
      for (const result of results) {
        const streamId = result.streamId ?? UNASSIGNED_STREAM;
        const bucket = byStream.get(streamId) ?? [];
        bucket.push(result);
        byStream.set(streamId, bucket);
      }
      const streams: StreamResults[] = [...byStream.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([streamId, streamResults]) => ({ streamId, results: this.ranker.rank(streamResults) }));

      const summary = this.summarizer.summarizeGrade(streams, snapshot.subjects, {
        vocabulary: snapshot.vocabulary,
        settings,
      });
      return {
        query,
        settings,
        streams: streams.map((s) => ({ streamId: s.streamId, results: [...s.results] })),
        summary,
      };
    });
  }

  // One read of every source per run; the engine never goes back for more.
  private async loadSnapshot(query: CohortQuery): Promise<Snapshot> {
    const [students, subjects, systems] = await Promise.all([
      this.markSource.findCohortStudents(query),
      this.subjectSource.findSubjects(query.educationLevel),
      this.gradingSource.findGradingSystems(),
    ]);
    const marks = await this.markSource.findMarks(
      students.map((s) => s.id),
      query.termId,
      query.assessmentType,
    );
    return { students, marks, subjects, vocabulary: new GradingVocabulary(systems) };
  }

  // Every failure of a run, from reading the snapshot to summarizing, is logged once here.
  private async run<T>(query: CohortQuery, compute: () => Promise<T>): Promise<T> {
    try {
      return await compute();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Aggregation failed for grade ${query.gradeId} ${query.termId}: ${message}`);
      throw error;
    }
  }
}
