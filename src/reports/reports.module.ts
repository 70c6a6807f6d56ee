import { Module } from '@nestjs/common';
import { AggregationModule } from '../aggregation/aggregation.module';
import { PerformanceSourcesModule } from '../database/performance-sources.module';
import { PerformanceReportService } from './performance-report.service';

@Module({
  imports: [AggregationModule, PerformanceSourcesModule],
  providers: [PerformanceReportService],
  exports: [PerformanceReportService],
})
export class ReportsModule {}
