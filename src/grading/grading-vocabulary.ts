import { Grade, GradeBand, GradingSystemDefinition } from '../common/types/performance.types';
import {
  InvalidGradingSystemException,
  InvalidPercentageException,
  UnknownSystemException,
} from '../common/exceptions/performance.exceptions';

interface RegisteredSystem {
  readonly definition: GradingSystemDefinition;
  // highest lower bound first
  readonly bands: readonly GradeBand[];
}

/**
 * The set of grading systems in force for one run. Built from the grading
 * source per request and passed around explicitly; nothing here is global.
 */
export class GradingVocabulary {
  private readonly systems: ReadonlyMap<string, RegisteredSystem>;

  constructor(definitions: readonly GradingSystemDefinition[]) {
    const systems = new Map<string, RegisteredSystem>();
    for (const definition of definitions) {
      if (systems.has(definition.id)) {
        throw new InvalidGradingSystemException(definition.id, 'registered twice');
      }
      systems.set(definition.id, {
        definition,
        bands: GradingVocabulary.orderBands(definition),
      });
    }
    this.systems = systems;
  }

  private static orderBands(definition: GradingSystemDefinition): GradeBand[] {
    const { id, bands } = definition;
    if (bands.length === 0) throw new InvalidGradingSystemException(id, 'no bands');

    const labels = new Set<string>();
    const bounds = new Set<number>();
    for (const band of bands) {
      if (!Number.isFinite(band.minPercentage) || band.minPercentage < 0 || band.minPercentage > 100) {
        throw new InvalidGradingSystemException(id, `band ${band.label} starts at ${band.minPercentage}`);
      }
      if (labels.has(band.label)) throw new InvalidGradingSystemException(id, `duplicate label ${band.label}`);
      if (bounds.has(band.minPercentage)) {
        throw new InvalidGradingSystemException(id, `two bands start at ${band.minPercentage}`);
      }
      labels.add(band.label);
      bounds.add(band.minPercentage);
    }
    if (!bounds.has(0)) throw new InvalidGradingSystemException(id, 'no band starts at 0');

    return [...bands].sort((a, b) => b.minPercentage - a.minPercentage);
  }

  has(systemId: string): boolean {
    return this.systems.has(systemId);
  }

  systemIds(): string[] {
    return [...this.systems.keys()];
  }

  bandsFor(systemId: string): readonly GradeBand[] {
    return this.lookup(systemId).bands;
  }

  passMarkFor(systemId: string): number {
    return this.lookup(systemId).definition.passMarkPercentage;
  }

  /** First band, checked high to low, whose lower bound is <= percentage. */
  gradeFor(percentage: number, systemId: string): Grade {
    if (!Number.isFinite(percentage) || percentage < 0 || percentage > 100) {
      throw new InvalidPercentageException(percentage);
    }
    const { bands } = this.lookup(systemId);
    const band = bands.find((b) => percentage >= b.minPercentage);
    // unreachable: orderBands guarantees a band at 0
    if (!band) throw new InvalidGradingSystemException(systemId, `no band covers ${percentage}`);
    return { label: band.label, name: band.name, points: band.points };
  }

  private lookup(systemId: string): RegisteredSystem {
    const system = this.systems.get(systemId);
    if (!system) throw new UnknownSystemException(systemId);
    return system;
  }
}
