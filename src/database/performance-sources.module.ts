import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { GRADING_SOURCE, MARK_SOURCE, SUBJECT_SOURCE } from '../common/sources/performance-sources';
import { GradingConfigService } from '../grading/grading-config.service';
import { SubjectStructureService } from '../subjects/subject-structure.service';
import { MarkSnapshotService } from '../marks/mark-snapshot.service';
import { performanceEntities } from './database.module';

@Module({
  imports: [TypeOrmModule.forFeature(performanceEntities)],
  providers: [
    GradingConfigService,
    SubjectStructureService,
    MarkSnapshotService,
    { provide: GRADING_SOURCE, useExisting: GradingConfigService },
    { provide: SUBJECT_SOURCE, useExisting: SubjectStructureService },
    { provide: MARK_SOURCE, useExisting: MarkSnapshotService },
  ],
  exports: [GRADING_SOURCE, SUBJECT_SOURCE, MARK_SOURCE, GradingConfigService],
})
export class PerformanceSourcesModule {}
