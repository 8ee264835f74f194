import * as fs from 'fs';
import * as path from 'path';
import { Injectable } from '@nestjs/common';
import { CredentialService } from '../credential/credential.service';
import { LogService } from '../log/log.service';
import { MailerService } from '../mailer/mailer.service';
import { MarketService } from '../market/market.service';
import { NewsService } from '../news/news.service';
import { ExitCode, FetchError, ReportError } from '../../libs/errors/report.error';
import { ReportFormatter } from '../../libs/report/report.formatter';
import { ReportConfig } from '../../models/report-config';
import { RunOptions, RunResult } from '../../models/report';

@Injectable()
export class ReportService {
  reportFormatter: ReportFormatter = new ReportFormatter();

  isRunning = false;

  constructor(
    private readonly credentialService: CredentialService,
    private readonly newsService: NewsService,
    private readonly marketService: MarketService,
    private readonly mailerService: MailerService,
    private readonly logService: LogService,
  ) { }

  /**
   * Never throws: every failure becomes a non-zero exit code and a log entry.
   */
  async execute(options: RunOptions = {}): Promise<number> {
    if (this.isRunning) {
      this.logService.warn('A report run is already in progress, ignoring this trigger');
      return ExitCode.Success;
    }

    this.isRunning = true;
    let exitCode: number = ExitCode.Failure;
    try {
      this.logService.startRun();
      const result = await this.run(options);
      exitCode = result.exitCode;
    } catch (e) {
      exitCode = e instanceof ReportError ? e.exitCode : ExitCode.Failure;
      this.logService.error('Report run failed', e);
    } finally {
      this.logService.endRun(exitCode);
      this.isRunning = false;
    }
    return exitCode;
  }

  async run(options: RunOptions = {}): Promise<RunResult> {
    this.logService.log(options.dryRun ? 'Generating report (dry run)...' : 'Generating and sending report...');
    const config = this.credentialService.load();
    const degraded: string[] = [];

    const cryptoNews = await this.collect(config, degraded, () => this.newsService.getCryptoNews(config.news));
    const politicalNews = await this.collect(config, degraded, () => this.newsService.getPoliticalNews(config.news));
    const markets = await this.collect(config, degraded, () => this.marketService.getMarketSummaries(config.market));

    const report = this.reportFormatter.format({
      cryptoNews,
      politicalNews,
      markets,
      generatedAt: new Date(),
      title: config.report.title,
      timezoneOffset: config.report.timezoneOffset,
      unavailable: degraded,
    });

    if (options.dryRun) {
      const filePath = this.saveReport(config, report.date, report.html);
      this.logService.log(`Dry run, report written to ${filePath}`);
      return { exitCode: ExitCode.Success, report, delivered: false, degraded };
    }

    await this.mailerService.send(config.mail, report);
    return { exitCode: ExitCode.Success, report, delivered: true, degraded };
  }

  /**
   * Applies the fetch failure policy to one section: degrade leaves the section
   * empty and records it, abort rethrows.
   */
  async collect<T>(config: ReportConfig, degraded: string[], fetchSection: () => Promise<T[]>): Promise<T[]> {
    try {
      return await fetchSection();
    } catch (e) {
      if (!(e instanceof FetchError) || config.fetchFailurePolicy === 'abort') throw e;
      this.logService.warn(`${e.message}, continuing with an empty ${e.section} section`);
      degraded.push(e.section);
      return [];
    }
  }

  saveReport(config: ReportConfig, date: string, html: string) {
    const filePath = path.join(config.report.outputDir, `report_${date}.html`);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, html, { encoding: 'utf8' });
    return filePath;
  }
}
