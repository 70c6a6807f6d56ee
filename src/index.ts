export * from './common/types/performance.types';
export * from './common/exceptions/performance.exceptions';
export * from './common/sources/performance-sources';
export { roundScore, PERCENTAGE_PRECISION } from './common/utils/rounding.util';
export { GradingVocabulary } from './grading/grading-vocabulary';
export { toGradingSystemDefinitions } from './grading/dtos/grading-system.dto';
export { SubjectModelResolver } from './subjects/subject-model.resolver';
export type { ResolvedSubject, WeightedComponent } from './subjects/subject-model.resolver';
export { MarkNormalizer, MarkBook, MAX_RAW_SCALE } from './marks/mark-normalizer.service';
export type { NormalizedSubject } from './marks/mark-normalizer.service';
export { StudentAggregator } from './aggregation/student-aggregator.service';
export type { AggregateRequest, AggregateCohortRequest, AggregationContext } from './aggregation/student-aggregator.service';
export { ClassRanker } from './ranking/class-ranker.service';
export { CohortSummarizer } from './analytics/cohort-summarizer.service';
export type { SummaryContext } from './analytics/cohort-summarizer.service';
export { AggregationModule } from './aggregation/aggregation.module';
export { PerformanceReportService } from './reports/performance-report.service';
export { CohortQueryDto } from './reports/dto/performance-report.dto';
export type { CohortReport, GradeReport, GradeQuery, StreamReport } from './reports/dto/performance-report.dto';
export { ReportsModule } from './reports/reports.module';
