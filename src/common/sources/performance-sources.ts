import { GradingSystemDefinition, RawMark, StudentRef, Subject } from '../types/performance.types';

// Injection tokens for the collaborators that feed the engine its snapshot.
export const MARK_SOURCE = 'MARK_SOURCE';
export const SUBJECT_SOURCE = 'SUBJECT_SOURCE';
export const GRADING_SOURCE = 'GRADING_SOURCE';

/** A grade + stream + term + assessment cohort. Omit streamId for the whole grade. */
export interface CohortQuery {
  gradeId: string;
  streamId?: string;
  termId: string;
  assessmentType: string;
  educationLevel: string;
}

export interface MarkSource {
  findCohortStudents(cohort: CohortQuery): Promise<StudentRef[]>;
  findMarks(studentIds: readonly string[], termId: string, assessmentType: string): Promise<RawMark[]>;
}

export interface SubjectStructureSource {
  findSubjects(educationLevel: string): Promise<Subject[]>;
}

export interface GradingConfigSource {
  findGradingSystems(): Promise<GradingSystemDefinition[]>;
}
