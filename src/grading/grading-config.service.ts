import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { GradingSystemEntity } from './entities/grading-system.entity';
import { toGradingSystemDefinitions } from './dtos/grading-system.dto';
import { GradingConfigSource } from '../common/sources/performance-sources';
import { GradingSystemDefinition } from '../common/types/performance.types';
import defaultGradingSystems from './default-grading-systems.json';

@Injectable()
export class GradingConfigService implements GradingConfigSource {
  private readonly logger = new Logger(GradingConfigService.name);

  constructor(
    @InjectRepository(GradingSystemEntity) private readonly systemRepo: Repository<GradingSystemEntity>,
  ) {}

  async findGradingSystems(): Promise<GradingSystemDefinition[]> {
    const rows = await this.systemRepo.find({ where: { isActive: true }, order: { code: 'ASC' } });
    if (rows.length === 0) {
      this.logger.debug('No grading systems stored, using bundled defaults');
      return this.defaults();
    }
    return toGradingSystemDefinitions(
      rows.map((row) => ({
        id: row.code,
        name: row.name,
        // numeric columns come back from pg as strings
        passMarkPercentage: parseFloat(row.passMarkPercentage),
        bands: row.bands,
      })),
    );
  }

  defaults(): GradingSystemDefinition[] {
    return toGradingSystemDefinitions(defaultGradingSystems);
  }
}
