import moment from 'moment';
import { Article, NewsSection } from '../../models/article';
import { MARKET_SECTION, MarketSummary } from '../../models/market-summary';
import { Report, ReportInput } from '../../models/report';
import { escapeHtml } from '../../utils';

interface NewsBlock {
  heading: string;
  section: NewsSection;
  articles: Article[];
  empty: string;
  unavailable: string;
}

const UP_COLOR = '#1a7f37';
const DOWN_COLOR = '#cf222e';

const amount = (value: number, maximumFractionDigits: number) =>
  new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits }).format(value);

export class ReportFormatter {
  /**
   * Pure: the same input always yields the same Report.
   * The clock is an input (generatedAt), never read here.
   */
  format(input: ReportInput): Report {
    const { generatedAt, title, timezoneOffset, markets } = input;
    const unavailable = input.unavailable ?? [];
    const date = moment(generatedAt).utcOffset(timezoneOffset * 60).format('YYYY-MM-DD');
    const heading = `${title} - ${date}`;

    const news: NewsBlock[] = [
      {
        heading: 'Crypto News',
        section: NewsSection.Crypto,
        articles: input.cryptoNews,
        empty: 'No crypto news available today.',
        unavailable: 'Crypto news is unavailable right now.',
      },
      {
        heading: 'Political News',
        section: NewsSection.Political,
        articles: input.politicalNews,
        empty: 'No political news available today.',
        unavailable: 'Political news is unavailable right now.',
      },
    ];
    const marketPlaceholder = unavailable.includes(MARKET_SECTION)
      ? 'Market data is unavailable right now.'
      : 'No market data available today.';

    const text = [
      heading,
      '',
      'Market Summary (24h)',
      ...(markets.length ? markets.map(summary => this.marketLine(summary)) : [marketPlaceholder]),
      ...news.flatMap(block => [
        '',
        block.heading,
        ...(block.articles.length
          ? block.articles.flatMap((article, index) => this.articleLines(article, index, timezoneOffset))
          : [unavailable.includes(block.section) ? block.unavailable : block.empty]),
      ]),
      '',
    ].join('\n');

    const html = [
      '<html><body>',
      `<h2>${escapeHtml(heading)}</h2>`,
      '<h3>Market Summary (24h)</h3>',
      markets.length ? this.marketTable(markets) : `<p>${marketPlaceholder}</p>`,
      ...news.flatMap(block => [
        `<h3>${block.heading}</h3>`,
        block.articles.length
          ? `<ul>\n${block.articles.map(article => this.articleItem(article, timezoneOffset)).join('\n')}\n</ul>`
          : `<p>${unavailable.includes(block.section) ? block.unavailable : block.empty}</p>`,
      ]),
      '</body></html>',
      '',
    ].join('\n');

    return { subject: heading, html, text, date };
  }

  /**
   * ex: - BTC: $65,000.00 | 24h +2.50% | Vol $1,234,567.00
   */
  marketLine({ symbol, price, changePercent24h, quoteVolume24h }: MarketSummary) {
    return `- ${symbol}: ${this.formatPrice(price)} | 24h ${this.formatChange(changePercent24h)} | Vol ${this.formatVolume(quoteVolume24h)}`;
  }

  marketTable(markets: MarketSummary[]) {
    const rows = markets.map(({ symbol, price, changePercent24h, quoteVolume24h }) => {
      const color = changePercent24h < 0 ? DOWN_COLOR : UP_COLOR;
      return `<tr><td>${escapeHtml(symbol)}</td><td>${this.formatPrice(price)}</td>`
        + `<td style="color:${color}">${this.formatChange(changePercent24h)}</td>`
        + `<td>${this.formatVolume(quoteVolume24h)}</td></tr>`;
    });
    return [
      '<table border="1" cellpadding="5">',
      '<tr><th>Asset</th><th>Price (USD)</th><th>24h Change</th><th>24h Volume (USD)</th></tr>',
      ...rows,
      '</table>',
    ].join('\n');
  }

  articleLines(article: Article, index: number, timezoneOffset: number) {
    return [
      `${index + 1}. ${article.title} (${this.byline(article, timezoneOffset)})`,
      `   ${article.url}`,
    ];
  }

  articleItem(article: Article, timezoneOffset: number) {
    const description = article.description ? `<br><small>${escapeHtml(article.description)}</small>` : '';
    return `<li><a href="${escapeHtml(article.url)}">${escapeHtml(article.title)}</a>`
      + `<br><small>${escapeHtml(this.byline(article, timezoneOffset))}</small>${description}</li>`;
  }

  /**
   * ex: CoinDesk, 2026-10-19 08:30
   */
  byline({ source, publishedAt }: Article, timezoneOffset: number) {
    const published = moment.utc(publishedAt, moment.ISO_8601);
    if (!publishedAt || !published.isValid()) return source;
    return `${source}, ${published.utcOffset(timezoneOffset * 60).format('YYYY-MM-DD HH:mm')}`;
  }

  formatPrice(price: number) {
    if (!Number.isFinite(price)) return 'n/a';
    return `$${amount(price, price < 1 ? 6 : 2)}`;
  }

  formatChange(change: number) {
    if (!Number.isFinite(change)) return 'n/a';
    return `${change > 0 ? '+' : ''}${change.toFixed(2)}%`;
  }

  formatVolume(volume: number) {
    if (!Number.isFinite(volume)) return 'n/a';
    return `$${amount(volume, 2)}`;
  }
}
