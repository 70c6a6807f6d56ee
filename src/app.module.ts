import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { AggregationModule } from './aggregation/aggregation.module';
import { ReportsModule } from './reports/reports.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    AggregationModule,
    ReportsModule,
  ],
})
export class AppModule {}
