import { Injectable } from '@nestjs/common';
import { Component, Subject } from '../common/types/performance.types';
import {
  InvalidCompositeDefinitionException,
  InvalidSubjectScaleException,
} from '../common/exceptions/performance.exceptions';

export const WEIGHT_TOLERANCE = 1e-6;

export function isPositiveScale(scale: number): boolean {
  return Number.isFinite(scale) && scale > 0;
}

export interface WeightedComponent {
  readonly component: Component;
  readonly weight: number;
}

export interface ResolvedSubject {
  readonly subject: Subject;
  readonly isComposite: boolean;
  // empty for atomic subjects
  readonly components: readonly WeightedComponent[];
}

@Injectable()
export class SubjectModelResolver {
  // Weights are checked here, when a subject is about to be scored, not when it was saved.
  resolve(subject: Subject): ResolvedSubject {
    if (subject.maxScale !== undefined && !isPositiveScale(subject.maxScale)) {
      throw new InvalidSubjectScaleException(subject.id, subject.maxScale);
    }
    if (!subject.isComposite) {
      return { subject, isComposite: false, components: [] };
    }

    if (subject.components.length === 0) {
      throw new InvalidCompositeDefinitionException(subject.id, 'no components');
    }

    const seen = new Set<string>();
    for (const component of subject.components) {
      if (!Number.isFinite(component.weight) || component.weight <= 0) {
        throw new InvalidCompositeDefinitionException(
          subject.id,
          `component '${component.id}' has weight ${component.weight}`,
        );
      }
      if (seen.has(component.id)) {
        throw new InvalidCompositeDefinitionException(subject.id, `component '${component.id}' listed twice`);
      }
      seen.add(component.id);
    }

    const total = subject.components.reduce((sum, c) => sum + c.weight, 0);
    if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
      throw new InvalidCompositeDefinitionException(subject.id, `weights sum to ${total}, expected 1`);
    }

    return {
      subject,
      isComposite: true,
      components: subject.components.map((component) => ({ component, weight: component.weight })),
    };
  }

  resolveAll(subjects: readonly Subject[]): ResolvedSubject[] {
    return subjects.map((subject) => this.resolve(subject));
  }
}
