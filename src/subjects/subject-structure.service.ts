import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { SubjectEntity } from './entities/subject.entity';
import { SubjectStructureSource } from '../common/sources/performance-sources';
import { Subject } from '../common/types/performance.types';

@Injectable()
export class SubjectStructureService implements SubjectStructureSource {
  constructor(
    @InjectRepository(SubjectEntity) private readonly subjectRepo: Repository<SubjectEntity>,
  ) {}

  async findSubjects(educationLevel: string): Promise<Subject[]> {
    const rows = await this.subjectRepo.find({
      where: { educationLevel, isActive: true },
      relations: ['components'],
      order: { position: 'ASC', name: 'ASC' },
    });
    return rows.map((row) => this.toSubject(row));
  }

  private toSubject(row: SubjectEntity): Subject {
    const components = [...(row.components ?? [])]
      .sort((a, b) => a.position - b.position)
      .map((c) => ({ id: c.id, name: c.name, weight: parseFloat(c.weight) }));
    return {
      id: row.id,
      name: row.name,
      educationLevel: row.educationLevel,
      isComposite: row.isComposite,
      ...(row.maxScale !== null ? { maxScale: row.maxScale } : {}),
      components,
    };
  }
}
