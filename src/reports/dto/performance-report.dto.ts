import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import {
  AggregationSettings,
  CohortSummary,
  GradeSummary,
  StudentResult,
} from '../../common/types/performance.types';
import { CohortQuery } from '../../common/sources/performance-sources';

export class CohortQueryDto implements CohortQuery {
  @IsString() @IsNotEmpty() gradeId!: string;
  @IsOptional() @IsString() @IsNotEmpty() streamId?: string;
  @IsString() @IsNotEmpty() termId!: string;
  @IsString() @IsNotEmpty() assessmentType!: string;
  @IsString() @IsNotEmpty() educationLevel!: string;
}

export type GradeQuery = Omit<CohortQuery, 'streamId'>;

export interface CohortReport {
  query: CohortQuery;
  settings: AggregationSettings;
  // ranked, best first
  results: StudentResult[];
  summary: CohortSummary;
}

export interface StreamReport {
  streamId: string;
  // ranked within the stream
  results: StudentResult[];
}

export interface GradeReport {
  query: GradeQuery;
  settings: AggregationSettings;
  streams: StreamReport[];
  summary: GradeSummary;
}
