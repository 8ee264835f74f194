import { NewsSection } from '../../models/article';
import { MARKET_SECTION } from '../../models/market-summary';
import { ReportInput } from '../../models/report';
import { article, marketSummary } from '../../testing/fixtures';
import { ReportFormatter } from './report.formatter';

describe('ReportFormatter', () => {
  const formatter = new ReportFormatter();

  const input = (overrides: Partial<ReportInput> = {}): ReportInput => ({
    cryptoNews: [article('Bitcoin tops record')],
    politicalNews: [],
    markets: [marketSummary('BTC', { price: 65000.5, changePercent24h: 2.5, quoteVolume24h: 1234567.891 })],
    generatedAt: new Date('2026-10-19T12:00:00Z'),
    title: 'Crypto Daily Report',
    timezoneOffset: 0,
    ...overrides,
  });

  it('should render the plain text body', () => {
    const report = formatter.format(input());

    expect(report.subject).toBe('Crypto Daily Report - 2026-10-19');
    expect(report.date).toBe('2026-10-19');
    expect(report.text).toBe([
      'Crypto Daily Report - 2026-10-19',
      '',
      'Market Summary (24h)',
      '- BTC: $65,000.50 | 24h +2.50% | Vol $1,234,567.89',
      '',
      'Crypto News',
      '1. Bitcoin tops record (Chain Daily, 2026-10-19 08:30)',
      '   https://news.example.com/bitcoin-tops-record',
      '',
      'Political News',
      'No political news available today.',
      '',
    ].join('\n'));
  });

  it('should render the html body', () => {
    const { html } = formatter.format(input());

    expect(html).toContain('<h2>Crypto Daily Report - 2026-10-19</h2>');
    expect(html).toContain('<tr><td>BTC</td><td>$65,000.50</td><td style="color:#1a7f37">+2.50%</td><td>$1,234,567.89</td></tr>');
    expect(html).toContain('<li><a href="https://news.example.com/bitcoin-tops-record">Bitcoin tops record</a>'
      + '<br><small>Chain Daily, 2026-10-19 08:30</small></li>');
    expect(html).toContain('<h3>Political News</h3>\n<p>No political news available today.</p>');
  });

  it('should be deterministic', () => {
    expect(formatter.format(input())).toEqual(formatter.format(input()));
  });

  it('should render placeholders for empty sections', () => {
    const report = formatter.format(input({ cryptoNews: [], politicalNews: [], markets: [] }));

    expect(report.text).toBe([
      'Crypto Daily Report - 2026-10-19',
      '',
      'Market Summary (24h)',
      'No market data available today.',
      '',
      'Crypto News',
      'No crypto news available today.',
      '',
      'Political News',
      'No political news available today.',
      '',
    ].join('\n'));
    expect(report.html).toContain('<p>No crypto news available today.</p>');
  });

  it('should mark sections that could not be fetched', () => {
    const report = formatter.format(input({
      cryptoNews: [],
      markets: [],
      unavailable: [NewsSection.Crypto, MARKET_SECTION],
    }));

    expect(report.text).toContain('Market Summary (24h)\nMarket data is unavailable right now.\n');
    expect(report.text).toContain('Crypto News\nCrypto news is unavailable right now.\n');
    expect(report.text).toContain('Political News\nNo political news available today.\n');
  });

  it('should escape article text in html', () => {
    const { html, text } = formatter.format(input({
      cryptoNews: [article('SEC <b>vs</b> "crypto" & co', {
        url: 'https://news.example.com/?a=1&b=2',
        source: 'Law & Ledger',
        description: '<script>alert(1)</script>',
      })],
    }));

    expect(html).toContain('<a href="https://news.example.com/?a=1&amp;b=2">SEC &lt;b&gt;vs&lt;/b&gt; &quot;crypto&quot; &amp; co</a>');
    expect(html).toContain('<small>Law &amp; Ledger, 2026-10-19 08:30</small><br><small>&lt;script&gt;alert(1)&lt;/script&gt;</small>');
    expect(text).toContain('1. SEC <b>vs</b> "crypto" & co (Law & Ledger, 2026-10-19 08:30)');
  });

  it('should format dates in the configured timezone', () => {
    const report = formatter.format(input({ generatedAt: new Date('2026-10-19T23:30:00Z'), timezoneOffset: 2 }));

    expect(report.subject).toBe('Crypto Daily Report - 2026-10-20');
    expect(report.text).toContain('1. Bitcoin tops record (Chain Daily, 2026-10-19 10:30)');
  });

  it('should omit an unparseable publish time', () => {
    const report = formatter.format(input({ cryptoNews: [article('Undated', { publishedAt: '' })] }));

    expect(report.text).toContain('1. Undated (Chain Daily)');
  });

  it('should format small prices, losses and missing figures', () => {
    expect(formatter.marketLine(marketSummary('SHIB', { price: 0.00001234, changePercent24h: -1.25, quoteVolume24h: Number.NaN })))
      .toBe('- SHIB: $0.000012 | 24h -1.25% | Vol n/a');
  });
});
