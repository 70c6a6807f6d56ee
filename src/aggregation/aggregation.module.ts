import { Module } from '@nestjs/common';
import { SubjectModelResolver } from '../subjects/subject-model.resolver';
import { MarkNormalizer } from '../marks/mark-normalizer.service';
import { StudentAggregator } from './student-aggregator.service';
import { ClassRanker } from '../ranking/class-ranker.service';
import { CohortSummarizer } from '../analytics/cohort-summarizer.service';

// The pure engine: no repositories, no configuration, safe to import anywhere.
@Module({
  providers: [SubjectModelResolver, MarkNormalizer, StudentAggregator, ClassRanker, CohortSummarizer],
  exports: [SubjectModelResolver, MarkNormalizer, StudentAggregator, ClassRanker, CohortSummarizer],
})
export class AggregationModule {}
