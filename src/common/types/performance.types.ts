// Value records shared by every stage of the engine. None of these are ORM
// entities: sources map their rows into these shapes before the engine sees them.

export const MissingMark = Object.freeze({ kind: 'MissingMark' as const });
export type MissingMark = typeof MissingMark;

/** A percentage in [0, 100], or the explicit "nothing recorded" sentinel. */
export type MarkValue = number | MissingMark;

export function isMissingMark(value: MarkValue): value is MissingMark {
  return typeof value !== 'number';
}

export interface Component {
  readonly id: string;
  readonly name: string;
  // fraction of the parent subject; siblings sum to 1.0
  readonly weight: number;
}

export interface Subject {
  readonly id: string;
  readonly name: string;
  readonly educationLevel: string;
  readonly isComposite: boolean;
  // raw-mark-like scale this subject adds to a student's total
  readonly maxScale?: number;
  readonly components: readonly Component[];
}

export interface RawMark {
  readonly studentId: string;
  readonly subjectOrComponentId: string;
  readonly rawScore: number;
  readonly maxRawScore: number;
}

export interface StudentRef {
  readonly id: string;
  readonly name: string;
  readonly streamId?: string;
}

export interface GradeBand {
  readonly minPercentage: number;
  readonly label: string;
  readonly name: string;
  readonly points: number;
}

export interface GradingSystemDefinition {
  readonly id: string;
  readonly name: string;
  readonly passMarkPercentage: number;
  readonly bands: readonly GradeBand[];
}

export interface Grade {
  readonly label: string;
  readonly name: string;
  readonly points: number;
}

export interface ComponentScore {
  readonly componentId: string;
  readonly componentName: string;
  readonly weight: number;
  readonly percentage: MarkValue;
}

export interface SubjectScore {
  readonly subjectId: string;
  readonly subjectName: string;
  readonly percentage: MarkValue;
  readonly grade: Grade | null;
  readonly components: readonly ComponentScore[];
}

export interface StudentResult {
  readonly studentId: string;
  readonly studentName: string;
  readonly streamId?: string;
  readonly termId: string;
  readonly assessmentType: string;
  readonly subjects: readonly SubjectScore[];
  readonly totalScore: number;
  readonly averagePercentage: MarkValue;
  readonly overallGrade: string | null;
  readonly overallPoints: number | null;
  readonly additionalGrades: Readonly<Record<string, Grade>>;
  // assigned by the ranker; null until then
  readonly rank: number | null;
}

/** Explicit configuration for one aggregation run. */
export interface AggregationSettings {
  readonly activeSystem: string;
  readonly secondarySystems: readonly string[];
  readonly subjectMaxScale: number;
}

export interface SubjectSummary {
  readonly subjectId: string;
  readonly subjectName: string;
  readonly averagePercentage: MarkValue;
  readonly grade: Grade | null;
  readonly gradedCount: number;
  readonly missingCount: number;
  readonly highest: MarkValue;
  readonly lowest: MarkValue;
}

export interface BandCount {
  readonly label: string;
  readonly name: string;
  readonly count: number;
}

export interface TopPerformer {
  readonly studentId: string;
  readonly studentName: string;
  readonly rank: number | null;
  readonly totalScore: number;
  readonly averagePercentage: MarkValue;
}

export interface CohortSummary {
  readonly studentCount: number;
  readonly subjects: readonly SubjectSummary[];
  readonly topSubject: SubjectSummary | null;
  readonly leastPerformingSubject: SubjectSummary | null;
  readonly bandDistribution: readonly BandCount[];
  readonly ungradedCount: number;
  readonly meanPercentage: MarkValue;
  readonly meanGrade: Grade | null;
  readonly meanPoints: number | null;
  readonly meanTotalScore: number | null;
  readonly passCount: number;
  readonly topPerformers: readonly TopPerformer[];
}

export interface StreamResults {
  readonly streamId: string;
  readonly results: readonly StudentResult[];
}

export interface GradeSummary {
  readonly overall: CohortSummary;
  readonly ranked: readonly StudentResult[];
  readonly streams: readonly { readonly streamId: string; readonly summary: CohortSummary }[];
}
