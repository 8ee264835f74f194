import { FetchFailurePolicy } from '../app.environment';

export interface NewsConfig {
  apiKey: string;
  baseUrl: string;
  language: string;
  cryptoQuery: string;
  politicalQuery: string;
  cryptoLimit: number;
  politicalLimit: number;
  timeoutMs: number;
}

export interface MarketConfig {
  symbols: string[];
  quoteAsset: string;
  timeoutMs: number;
}

export interface MailConfig {
  sender: string;
  password: string;
  recipients: string[];
  smtpHost: string;
  smtpPort: number;
  /**
   * Implicit TLS, true for port 465
   */
  secure: boolean;
  timeoutMs: number;
}

export interface ReportSettings {
  title: string;
  timezoneOffset: number;
  outputDir: string;
}

export interface ReportConfig {
  readonly news: Readonly<NewsConfig>;
  readonly market: Readonly<MarketConfig>;
  readonly mail: Readonly<MailConfig>;
  readonly report: Readonly<ReportSettings>;
  readonly fetchFailurePolicy: FetchFailurePolicy;
}
