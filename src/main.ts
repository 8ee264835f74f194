#!/usr/bin/env node
import 'reflect-metadata';
import { Command } from 'commander';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ExitCode } from './libs/errors/report.error';
import { ReportService } from './services/report/report.service';
import { SchedulerService } from './services/scheduler/scheduler.service';

interface CliOptions {
  dryRun?: boolean;
  daemon?: boolean;
}

async function bootstrap() {
  const program = new Command()
    .name('crypto-mail-report')
    .description('Fetch crypto news and a 24h market summary, then email the report')
    .option('--dry-run', 'write the report to the data directory instead of sending it')
    .option('--daemon', 'stay running and send the report every day at 10:00 UTC (with --dry-run, write it instead)')
    .parse(process.argv);
  const { dryRun = false, daemon = false } = program.opts<CliOptions>();

  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });
  app.enableShutdownHooks();

  if (daemon) {
    await app.get(SchedulerService).start({ dryRun });
    return;
  }

  const exitCode = await app.get(ReportService).execute({ dryRun });
  await app.close();
  process.exitCode = exitCode;
}

bootstrap().catch(error => {
  console.error('Fatal error:', error);
  process.exitCode = ExitCode.Failure;
});
