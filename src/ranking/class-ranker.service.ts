import { Injectable } from '@nestjs/common';
import { isMissingMark, MarkValue, StudentResult } from '../common/types/performance.types';

// A missing average sorts below every real one.
function averageKey(value: MarkValue): number {
  return isMissingMark(value) ? Number.NEGATIVE_INFINITY : value;
}

@Injectable()
export class ClassRanker {
  /**
   * Orders by total, then average, then name, then input order. Students level
   * on total and average share a position and the next one skips ahead
   * (1, 1, 3). Returns new records; the inputs keep rank as they had it.
   */
  rank(results: readonly StudentResult[]): StudentResult[] {
    const ordered = [...results].sort((a, b) => this.compare(a, b));

    const ranked: StudentResult[] = [];
    ordered.forEach((result, i) => {
      const previous = ranked[i - 1];
      const rank = previous && this.sameStanding(previous, result) ? previous.rank : i + 1;
      ranked.push({ ...result, rank });
    });
    return ranked;
  }

  compare(a: StudentResult, b: StudentResult): number {
    if (a.totalScore !== b.totalScore) return b.totalScore - a.totalScore;
    const avgA = averageKey(a.averagePercentage);
    const avgB = averageKey(b.averagePercentage);
    if (avgA !== avgB) return avgB > avgA ? 1 : -1;
    if (a.studentName < b.studentName) return -1;
    if (a.studentName > b.studentName) return 1;
    return 0;
  }

  private sameStanding(a: StudentResult, b: StudentResult): boolean {
    return a.totalScore === b.totalScore && averageKey(a.averagePercentage) === averageKey(b.averagePercentage);
  }
}
