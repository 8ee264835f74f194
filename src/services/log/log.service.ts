import * as fs from 'fs';
import * as path from 'path';
import moment from 'moment';
import { Injectable } from '@nestjs/common';
import { AppEnvironment } from '../../app.environment';

export enum LogLevel {
  Info = 'INFO',
  Warn = 'WARN',
  Error = 'ERROR',
}

/**
 * Environment keys whose values never reach a log file.
 */
const SECRET_KEYS = ['NEWS_API_KEY', 'EMAIL_PASSWORD'];

const SNAPSHOT_KEYS = [
  'NODE_ENV',
  'NEWS_API_KEY',
  'EMAIL_SENDER',
  'EMAIL_PASSWORD',
  'EMAIL_RECIPIENT',
  'EMAIL_RECIPIENT2',
  'SMTP_HOST',
  'SMTP_PORT',
  'TRACKED_ASSETS',
  'FETCH_FAILURE_POLICY',
  'DATA_DIR',
];

@Injectable()
export class LogService {
  filePath = '';
  runFilePath = '';

  constructor(
    private readonly appEnvironment: AppEnvironment
  ) {
    const { logFileDir } = this.appEnvironment;
    this.filePath = `${logFileDir}/crypto_report.log`;
  }

  now() {
    const { timezoneOffset } = this.appEnvironment;
    return moment().utcOffset(timezoneOffset * 60);
  }

  getMessage(level: LogLevel, msg: unknown[]) {
    const { dateTimeFormat } = this.appEnvironment;
    const date = this.now().format(dateTimeFormat);

    const messages = msg.map(value => {
      if (typeof value === 'string') return value;
      if (value instanceof Error) return value.stack || value.message;
      if (typeof value === 'object') return JSON.stringify(value, null, 2);
      return String(value);
    }).join('  \n  ');
    return `${date} - ${level} - ${messages}\n`;
  }

  write(level: LogLevel, msg: unknown[]) {
    const data = this.getMessage(level, msg);
    this.append(this.filePath, data);
    if (this.runFilePath) this.append(this.runFilePath, data);

    if (this.appEnvironment.isTest()) return;
    if (level === LogLevel.Error) console.error(data.trimEnd());
    else if (level === LogLevel.Warn) console.warn(data.trimEnd());
    else console.log(data.trimEnd());
  }

  log(...msg: unknown[]) {
    this.write(LogLevel.Info, msg);
  }

  warn(...msg: unknown[]) {
    this.write(LogLevel.Warn, msg);
  }

  error(...msg: unknown[]) {
    this.write(LogLevel.Error, msg);
  }

  append(filePath: string, data: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.appendFileSync(filePath, data, { encoding: 'utf8' });
  }

  /**
   * Opens runs/run_YYYYMMDD_HHmmss.log and records what the batch wrapper used to:
   * start time, a masked environment snapshot and the working directory listing.
   */
  startRun() {
    const { logFileDir } = this.appEnvironment;
    const startedAt = this.now();
    this.runFilePath = `${logFileDir}/runs/run_${startedAt.format('YYYYMMDD_HHmmss')}.log`;

    this.log(`Run started at ${startedAt.format()}`);
    this.log('Environment', this.environmentSnapshot());
    this.log(`Directory listing of ${process.cwd()}`, this.directoryListing(process.cwd()).join('\n'));
    return this.runFilePath;
  }

  endRun(exitCode: number) {
    this.log(`Run finished with exit code ${exitCode}`);
    this.runFilePath = '';
  }

  environmentSnapshot(env: NodeJS.ProcessEnv = process.env) {
    const snapshot: Record<string, string> = {
      node: process.version,
      platform: process.platform,
      cwd: process.cwd(),
    };
    SNAPSHOT_KEYS.forEach(key => {
      const value = env[key];
      if (value === undefined || value === '') snapshot[key] = '<unset>';
      else snapshot[key] = SECRET_KEYS.includes(key) ? '<set>' : value;
    });
    return snapshot;
  }

  directoryListing(dir: string) {
    try {
      return fs.readdirSync(dir, { withFileTypes: true })
        .map(entry => entry.isDirectory() ? `${entry.name}/` : entry.name)
        .sort();
    } catch (e) {
      return [`<unreadable: ${e instanceof Error ? e.message : String(e)}>`];
    }
  }
}
