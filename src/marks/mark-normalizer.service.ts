import { Injectable } from '@nestjs/common';
import {
  ComponentScore,
  isMissingMark,
  MarkValue,
  MissingMark,
  RawMark,
  Subject,
} from '../common/types/performance.types';
import {
  DuplicateMarkException,
  InvalidMarkScaleException,
} from '../common/exceptions/performance.exceptions';
import { roundScore } from '../common/utils/rounding.util';
import { ResolvedSubject, SubjectModelResolver } from '../subjects/subject-model.resolver';

// Largest max-mark any assessment may be scored out of.
export const MAX_RAW_SCALE = 1000;

/** Marks of one snapshot, looked up by (student, subject or component). */
export class MarkBook {
  private readonly marks = new Map<string, RawMark>();

  constructor(marks: readonly RawMark[]) {
    for (const mark of marks) {
      const key = MarkBook.key(mark.studentId, mark.subjectOrComponentId);
      if (this.marks.has(key)) throw new DuplicateMarkException(mark.studentId, mark.subjectOrComponentId);
      this.marks.set(key, mark);
    }
  }

  private static key(studentId: string, targetId: string): string {
    return `${studentId}\u0000${targetId}`;
  }

  get(studentId: string, targetId: string): RawMark | undefined {
    return this.marks.get(MarkBook.key(studentId, targetId));
  }

  get size(): number {
    return this.marks.size;
  }
}

export interface NormalizedSubject {
  readonly percentage: MarkValue;
  readonly components: readonly ComponentScore[];
}

@Injectable()
export class MarkNormalizer {
  constructor(private readonly resolver: SubjectModelResolver) {}

  index(marks: readonly RawMark[]): MarkBook {
    return new MarkBook(marks);
  }

  /** raw / max * 100 at engine precision. */
  percentageOf(mark: RawMark): number {
    const { rawScore, maxRawScore } = mark;
    if (!Number.isFinite(maxRawScore) || maxRawScore <= 0 || maxRawScore > MAX_RAW_SCALE) {
      throw new InvalidMarkScaleException(mark.studentId, mark.subjectOrComponentId, rawScore, maxRawScore);
    }
    if (!Number.isFinite(rawScore) || rawScore < 0 || rawScore > maxRawScore) {
      throw new InvalidMarkScaleException(mark.studentId, mark.subjectOrComponentId, rawScore, maxRawScore);
    }
    return roundScore((rawScore / maxRawScore) * 100);
  }

  normalize(studentId: string, subject: Subject, book: MarkBook): MarkValue {
    return this.breakdown(studentId, subject, book).percentage;
  }

  breakdown(studentId: string, subject: Subject, book: MarkBook): NormalizedSubject {
    return this.normalizeResolved(studentId, this.resolver.resolve(subject), book);
  }

  /**
   * Atomic subjects read the mark stored against the subject id. Composites
   * combine whichever components are marked, re-weighting them to sum to 1;
   * with no component marked the subject is MissingMark, not 0.
   */
  normalizeResolved(studentId: string, resolved: ResolvedSubject, book: MarkBook): NormalizedSubject {
    if (!resolved.isComposite) {
      const mark = book.get(studentId, resolved.subject.id);
      return { percentage: mark ? this.percentageOf(mark) : MissingMark, components: [] };
    }

    const components: ComponentScore[] = resolved.components.map(({ component, weight }) => {
      const mark = book.get(studentId, component.id);
      return {
        componentId: component.id,
        componentName: component.name,
        weight,
        percentage: mark ? this.percentageOf(mark) : MissingMark,
      };
    });

    let weighted = 0;
    let presentWeight = 0;
    for (const score of components) {
      if (isMissingMark(score.percentage)) continue;
      weighted += score.percentage * score.weight;
      presentWeight += score.weight;
    }

    if (presentWeight === 0) return { percentage: MissingMark, components };
    return { percentage: roundScore(weighted / presentWeight), components };
  }
}
