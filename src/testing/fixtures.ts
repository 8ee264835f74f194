import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AxiosHeaders, AxiosResponse } from 'axios';
import Mail from 'nodemailer/lib/mailer';
import { AppEnvironment, NodeEnvironment } from '../app.environment';
import { Article, NewsApiArticle } from '../models/article';
import { MarketSummary } from '../models/market-summary';
import { MailTransport, SentMail } from '../services/mailer/mail-transport';

export const tmpDir = () => fs.mkdtempSync(path.join(os.tmpdir(), 'crypto-report-'));

export const createEnvironment = (overrides: Partial<AppEnvironment> = {}): AppEnvironment =>
  Object.assign(new AppEnvironment(), {
    nodeEnvironment: NodeEnvironment.Test,
    newsApiKey: 'test-news-key',
    emailSender: 'sender@example.com',
    emailPassword: 'test-secret',
    emailRecipient: 'reader@example.com',
    logFileDir: tmpDir(),
  }, overrides);

export const axiosResponse = <T>(data: T, status = 200): AxiosResponse<T> => ({
  data,
  status,
  statusText: String(status),
  headers: {},
  config: { headers: new AxiosHeaders() },
});

export const newsApiArticle = (title: string, publishedAt: string, overrides: NewsApiArticle = {}): NewsApiArticle => ({
  source: { id: null, name: 'Chain Daily' },
  author: 'Staff',
  title,
  description: `${title} in brief`,
  url: `https://news.example.com/${title.toLowerCase().replace(/[^a-z0-9]+/g, '-')}`,
  urlToImage: null,
  publishedAt,
  content: null,
  ...overrides,
});

export const article = (title: string, overrides: Partial<Article> = {}): Article => ({
  title,
  source: 'Chain Daily',
  url: `https://news.example.com/${title.toLowerCase().replace(/[^a-z0-9]+/g, '-')}`,
  publishedAt: '2026-10-19T08:30:00Z',
  ...overrides,
});

export const marketSummary = (symbol: string, overrides: Partial<MarketSummary> = {}): MarketSummary => ({
  symbol,
  pair: `${symbol}USDT`,
  price: 100,
  changePercent24h: 1,
  volume24h: 10,
  quoteVolume24h: 1000,
  high24h: 110,
  low24h: 90,
  ...overrides,
});

/**
 * Shape of a Binance 24h ticker; every number arrives as a string.
 */
export const ticker = (symbol: string, lastPrice: string, priceChangePercent: string, quoteVolume = '1000000.00') => ({
  symbol,
  priceChange: '0',
  priceChangePercent,
  weightedAvgPrice: lastPrice,
  prevClosePrice: lastPrice,
  lastPrice,
  lastQty: '1',
  bidPrice: lastPrice,
  askPrice: lastPrice,
  openPrice: lastPrice,
  highPrice: lastPrice,
  lowPrice: lastPrice,
  volume: '100.00',
  quoteVolume,
  openTime: 0,
  closeTime: 0,
  firstId: 0,
  lastId: 0,
  count: 0,
});

/**
 * In-process SMTP stand-in recording what would have been sent.
 */
export class FakeMailTransport implements MailTransport {
  sent: Mail.Options[] = [];
  isClosed = false;
  verifyError?: Error;
  sendError?: Error;
  rejected: string[] = [];

  async verify(): Promise<true> {
    if (this.verifyError) throw this.verifyError;
    return true;
  }

  async sendMail(mail: Mail.Options): Promise<SentMail> {
    if (this.sendError) throw this.sendError;
    this.sent.push(mail);
    return { messageId: `<${this.sent.length}@test.local>`, rejected: this.rejected };
  }

  close() {
    this.isClosed = true;
  }
}

export const smtpError = (message: string, code: string) => Object.assign(new Error(message), { code });
