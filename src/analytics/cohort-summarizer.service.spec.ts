import { CohortSummarizer, SummaryContext } from './cohort-summarizer.service';
import { ClassRanker } from '../ranking/class-ranker.service';
import { GradingVocabulary } from '../grading/grading-vocabulary';
import { toGradingSystemDefinitions } from '../grading/dtos/grading-system.dto';
import defaultGradingSystems from '../grading/default-grading-systems.json';
import { MarkValue, MissingMark, StudentResult, Subject } from '../common/types/performance.types';

const subjects: Subject[] = [
  { id: 'math', name: 'Mathematics', educationLevel: 'upper_primary', isComposite: false, components: [] },
  { id: 'eng', name: 'English', educationLevel: 'upper_primary', isComposite: false, components: [] },
];

interface ResultInput {
  id: string;
  name: string;
  total: number;
  average: MarkValue;
  grade?: [string, number];
  math?: number;
  eng?: number;
}

function result(input: ResultInput): StudentResult {
  const score = (subject: Subject, percentage: number | undefined) => ({
    subjectId: subject.id,
    subjectName: subject.name,
    percentage: percentage ?? MissingMark,
    grade: null,
    components: [],
  });
  return {
    studentId: input.id,
    studentName: input.name,
    termId: 'term-1',
    assessmentType: 'End Term',
    subjects: [score(subjects[0], input.math), score(subjects[1], input.eng)],
    totalScore: input.total,
    averagePercentage: input.average,
    overallGrade: input.grade ? input.grade[0] : null,
    overallPoints: input.grade ? input.grade[1] : null,
    additionalGrades: {},
    rank: null,
  };
}

describe('CohortSummarizer', () => {
  const summarizer = new CohortSummarizer(new ClassRanker());
  const context: SummaryContext = {
    vocabulary: new GradingVocabulary(toGradingSystemDefinitions(defaultGradingSystems)),
    settings: { activeSystem: 'CBC', secondarySystems: [], subjectMaxScale: 100 },
  };
  const meetingExpectations = { label: 'M.E', name: 'Meeting Expectations', points: 3 };

  describe('summarize', () => {
    const results = [
      result({ id: 's2', name: 'Baraka', total: 40, average: 40, grade: ['A.E', 2], math: 40 }),
      result({ id: 's3', name: 'Chebet', total: 0, average: MissingMark }),
      result({ id: 's1', name: 'Achieng', total: 130, average: 65, grade: ['M.E', 3], math: 80, eng: 50 }),
    ];

    it('summarizes each subject over the students who sat it', () => {
      const summary = summarizer.summarize(results, subjects, context);

      expect(summary.subjects).toEqual([
        {
          subjectId: 'math',
          subjectName: 'Mathematics',
          averagePercentage: 60,
          grade: meetingExpectations,
          gradedCount: 2,
          missingCount: 1,
          highest: 80,
          lowest: 40,
        },
        {
          subjectId: 'eng',
          subjectName: 'English',
          averagePercentage: 50,
          grade: meetingExpectations,
          gradedCount: 1,
          missingCount: 2,
          highest: 50,
          lowest: 50,
        },
      ]);
      expect(summary.topSubject?.subjectId).toBe('math');
      expect(summary.leastPerformingSubject?.subjectId).toBe('eng');
    });

    it('counts bands including empty ones and keeps ungraded students apart', () => {
      const summary = summarizer.summarize(results, subjects, context);

      expect(summary.bandDistribution).toEqual([
        { label: 'E.E', name: 'Exceeding Expectations', count: 0 },
        { label: 'M.E', name: 'Meeting Expectations', count: 1 },
        { label: 'A.E', name: 'Approaching Expectations', count: 1 },
        { label: 'B.E', name: 'Below Expectations', count: 0 },
      ]);
      expect(summary.ungradedCount).toBe(1);
      expect(summary.studentCount).toBe(3);
    });

    it('computes cohort means over graded students only', () => {
      const summary = summarizer.summarize(results, subjects, context);

      expect(summary.meanPercentage).toBe(52.5);
      expect(summary.meanGrade).toEqual(meetingExpectations);
      expect(summary.meanPoints).toBe(2.5);
      expect(summary.meanTotalScore).toBe(56.7);
      expect(summary.passCount).toBe(2);
    });

    it('lists top performers in rank order', () => {
      const summary = summarizer.summarize(results, subjects, context);

      expect(summary.topPerformers).toEqual([
        { studentId: 's1', studentName: 'Achieng', rank: 1, totalScore: 130, averagePercentage: 65 },
        { studentId: 's2', studentName: 'Baraka', rank: 2, totalScore: 40, averagePercentage: 40 },
        { studentId: 's3', studentName: 'Chebet', rank: 3, totalScore: 0, averagePercentage: MissingMark },
      ]);
    });

    it('takes the top tenth of a large cohort but at least five', () => {
      const cohort = (size: number) =>
        Array.from({ length: size }, (_, i) =>
          result({ id: `s${i}`, name: `Student ${i}`, total: i, average: 50, grade: ['M.E', 3], math: 50 }),
        );

      expect(summarizer.summarize(cohort(12), subjects, context).topPerformers).toHaveLength(5);
      expect(summarizer.summarize(cohort(60), subjects, context).topPerformers).toHaveLength(6);
      expect(summarizer.summarize(cohort(60), subjects, context).topPerformers[0].studentId).toBe('s59');
    });

    it('prefers the subject listed first when averages tie', () => {
      const level = [result({ id: 's1', name: 'Achieng', total: 140, average: 70, grade: ['M.E', 3], math: 70, eng: 70 })];

      const summary = summarizer.summarize(level, subjects, context);

      expect(summary.topSubject?.subjectId).toBe('math');
      expect(summary.leastPerformingSubject?.subjectId).toBe('math');
    });

    it('reports an empty cohort without inventing zeros', () => {
      const summary = summarizer.summarize([], subjects, context);

      expect(summary.studentCount).toBe(0);
      expect(summary.meanPercentage).toBe(MissingMark);
      expect(summary.meanGrade).toBeNull();
      expect(summary.meanPoints).toBeNull();
      expect(summary.meanTotalScore).toBeNull();
      expect(summary.passCount).toBe(0);
      expect(summary.topPerformers).toEqual([]);
      expect(summary.topSubject).toBeNull();
      expect(summary.subjects[0]).toMatchObject({ averagePercentage: MissingMark, highest: MissingMark, gradedCount: 0 });
    });
  });

  describe('summarizeGrade', () => {
    const streamA = [result({ id: 'a1', name: 'Akinyi', total: 90, average: 90, grade: ['E.E', 4], math: 90 })];
    const streamB = [
      result({ id: 'b1', name: 'Bahati', total: 30, average: 30, grade: ['A.E', 2], math: 30 }),
      result({ id: 'b2', name: 'Bosire', total: 30, average: 30, grade: ['A.E', 2], math: 30 }),
      result({ id: 'b3', name: 'Buya', total: 30, average: 30, grade: ['A.E', 2], math: 30 }),
    ];

    it('pools students across streams instead of averaging stream means', () => {
      const summary = summarizer.summarizeGrade(
        [
          { streamId: 'east', results: streamA },
          { streamId: 'west', results: streamB },
        ],
        subjects,
        context,
      );

      // (90 + 30 + 30 + 30) / 4, not (90 + 30) / 2
      expect(summary.overall.meanPercentage).toBe(45);
      expect(summary.overall.studentCount).toBe(4);
      expect(summary.streams.map((s) => [s.streamId, s.summary.meanPercentage])).toEqual([
        ['east', 90],
        ['west', 30],
      ]);
    });

    it('re-ranks the union of all streams', () => {
      const summary = summarizer.summarizeGrade(
        [
          { streamId: 'west', results: streamB },
          { streamId: 'east', results: streamA },
        ],
        subjects,
        context,
      );

      expect(summary.ranked.map((r) => [r.studentId, r.rank])).toEqual([
        ['a1', 1],
        ['b1', 2],
        ['b2', 2],
        ['b3', 2],
      ]);
    });
  });
});
