import { Article } from './article';
import { MarketSummary } from './market-summary';

export interface Report {
  subject: string;

  html: string;

  text: string;

  /**
   * YYYY-MM-DD in the configured timezone
   */
  date: string;
}

export interface ReportInput {
  cryptoNews: Article[];

  politicalNews: Article[];

  markets: MarketSummary[];

  generatedAt: Date;

  title: string;

  /**
   * Hours from UTC
   */
  timezoneOffset: number;

  /**
   * Sections whose data could not be fetched
   */
  unavailable?: string[];
}

export interface RunOptions {
  dryRun?: boolean;
}

export interface RunResult {
  exitCode: number;

  report?: Report;

  delivered: boolean;

  degraded: string[];
}
