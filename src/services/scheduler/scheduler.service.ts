import { Injectable } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { LogService } from '../log/log.service';
import { RunOptions } from '../../models/report';
import { ReportService } from '../report/report.service';

export const DAILY_REPORT_JOB = 'daily-report';

/**
 * In-process stand-in for the external scheduler, used by --daemon.
 * The cron job is registered on every boot but only acts once enabled.
 */
@Injectable()
export class SchedulerService {
  isEnabled = false;
  runOptions: RunOptions = {};

  constructor(
    private readonly reportService: ReportService,
    private readonly logService: LogService
  ) { }

  /**
   * Options given here, such as dryRun, apply to every scheduled run.
   */
  async start(options: RunOptions = {}) {
    this.isEnabled = true;
    this.runOptions = options;
    this.logService.log(`Daemon started${options.dryRun ? ' (dry run)' : ''}, daily report scheduled at 10:00 UTC (${DAILY_REPORT_JOB})`);
    return this.reportService.execute(this.runOptions);
  }

  stop() {
    this.isEnabled = false;
  }

  @Cron(CronExpression.EVERY_DAY_AT_10AM, { name: DAILY_REPORT_JOB, timeZone: 'UTC' })
  async runDailyReport() {
    if (!this.isEnabled) return;
    const exitCode = await this.reportService.execute(this.runOptions);
    if (exitCode !== 0) this.logService.warn(`Scheduled report failed with exit code ${exitCode}, waiting for the next tick`);
  }
}
