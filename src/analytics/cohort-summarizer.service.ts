import { Injectable } from '@nestjs/common';
import {
  AggregationSettings,
  BandCount,
  CohortSummary,
  GradeSummary,
  isMissingMark,
  MarkValue,
  MissingMark,
  StreamResults,
  StudentResult,
  Subject,
  SubjectSummary,
} from '../common/types/performance.types';
import { mean, roundScore } from '../common/utils/rounding.util';
import { GradingVocabulary } from '../grading/grading-vocabulary';
import { ClassRanker } from '../ranking/class-ranker.service';

export interface SummaryContext {
  vocabulary: GradingVocabulary;
  settings: AggregationSettings;
}

// Top 10% of the cohort, but never fewer than five students.
export const MIN_TOP_PERFORMERS = 5;

function rounded(value: number | null): number | null {
  return value === null ? null : roundScore(value);
}

@Injectable()
export class CohortSummarizer {
  constructor(private readonly ranker: ClassRanker) {}

  summarize(results: readonly StudentResult[], subjects: readonly Subject[], context: SummaryContext): CohortSummary {
    const { vocabulary, settings } = context;
    const subjectSummaries = subjects.map((subject) => this.summarizeSubject(subject, results, context));

    const averages = results
      .map((r) => r.averagePercentage)
      .filter((value): value is number => !isMissingMark(value));
    const meanAverage = rounded(mean(averages));
    const points = results.map((r) => r.overallPoints).filter((p): p is number => p !== null);

    const bandDistribution: BandCount[] = vocabulary.bandsFor(settings.activeSystem).map((band) => ({
      label: band.label,
      name: band.name,
      count: results.filter((r) => r.overallGrade === band.label).length,
    }));
    const banded = bandDistribution.reduce((sum, band) => sum + band.count, 0);

    const passMark = vocabulary.passMarkFor(settings.activeSystem);
    const ranked = this.ranker.rank(results);
    const topCount = Math.min(ranked.length, Math.max(MIN_TOP_PERFORMERS, Math.floor(ranked.length / 10)));

    return {
      studentCount: results.length,
      subjects: subjectSummaries,
      ...this.extremes(subjectSummaries),
      bandDistribution,
      ungradedCount: results.length - banded,
      meanPercentage: meanAverage === null ? MissingMark : meanAverage,
      meanGrade: meanAverage === null ? null : vocabulary.gradeFor(meanAverage, settings.activeSystem),
      meanPoints: rounded(mean(points)),
      meanTotalScore: rounded(mean(results.map((r) => r.totalScore))),
      passCount: averages.filter((avg) => avg >= passMark).length,
      topPerformers: ranked.slice(0, topCount).map((r) => ({
        studentId: r.studentId,
        studentName: r.studentName,
        rank: r.rank,
        totalScore: r.totalScore,
        averagePercentage: r.averagePercentage,
      })),
    };
  }

  /**
   * Grade-level figures come from the pooled student results of every stream,
   * re-ranked together. Stream summaries are reported alongside but never
   * averaged into the grade figures.
   */
  summarizeGrade(streams: readonly StreamResults[], subjects: readonly Subject[], context: SummaryContext): GradeSummary {
    const ranked = this.ranker.rank(streams.flatMap((stream) => stream.results));
    return {
      overall: this.summarize(ranked, subjects, context),
      ranked,
      streams: streams.map((stream) => ({
        streamId: stream.streamId,
        summary: this.summarize(stream.results, subjects, context),
      })),
    };
  }

  private summarizeSubject(subject: Subject, results: readonly StudentResult[], context: SummaryContext): SubjectSummary {
    const marks: number[] = [];
    for (const result of results) {
      const score = result.subjects.find((s) => s.subjectId === subject.id);
      if (score && !isMissingMark(score.percentage)) marks.push(score.percentage);
    }

    const average = rounded(mean(marks));
    const extreme = (pick: (values: number[]) => number): MarkValue =>
      marks.length > 0 ? pick(marks) : MissingMark;

    return {
      subjectId: subject.id,
      subjectName: subject.name,
      averagePercentage: average === null ? MissingMark : average,
      grade: average === null ? null : context.vocabulary.gradeFor(average, context.settings.activeSystem),
      gradedCount: marks.length,
      missingCount: results.length - marks.length,
      highest: extreme((values) => Math.max(...values)),
      lowest: extreme((values) => Math.min(...values)),
    };
  }

  // ties go to the subject listed first
  private extremes(summaries: readonly SubjectSummary[]): Pick<CohortSummary, 'topSubject' | 'leastPerformingSubject'> {
    let top: { summary: SubjectSummary; avg: number } | null = null;
    let least: { summary: SubjectSummary; avg: number } | null = null;
    for (const summary of summaries) {
      const avg = summary.averagePercentage;
      if (isMissingMark(avg)) continue;
      if (!top || avg > top.avg) top = { summary, avg };
      if (!least || avg < least.avg) least = { summary, avg };
    }
    return { topSubject: top?.summary ?? null, leastPerformingSubject: least?.summary ?? null };
  }
}
