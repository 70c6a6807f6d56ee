import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { AppModule } from '../app.module';
import { PerformanceReportService } from '../reports/performance-report.service';
import { CohortQueryDto } from '../reports/dto/performance-report.dto';

// usage: print-cohort-report --grade <id> [--stream <id>] --term <id> --assessment "End Term" --level upper_primary
export function parseArgs(argv: readonly string[]): Record<string, string> {
  const args: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (!flag.startsWith('--')) continue;
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) continue;
    args[flag.slice(2)] = value;
    i++;
  }
  return args;
}

async function main() {
  const logger = new Logger('PrintCohortReport');
  const args = parseArgs(process.argv.slice(2));
  const query = plainToInstance(CohortQueryDto, {
    gradeId: args.grade,
    streamId: args.stream,
    termId: args.term,
    assessmentType: args.assessment,
    educationLevel: args.level,
  });
  const errors = validateSync(query);
  if (errors.length > 0) {
    logger.error(`Invalid arguments: ${errors.map((e) => e.property).join(', ')}`);
    process.exitCode = 1;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });
  try {
    const reports = app.get(PerformanceReportService);
    const report = await reports.buildCohortReport(query);
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
  } catch (err) {
    logger.error('Failed to build cohort report', err instanceof Error ? err.stack : String(err));
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
