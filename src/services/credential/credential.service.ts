import { Injectable } from '@nestjs/common';
import { AppEnvironment, FETCH_FAILURE_POLICIES, FetchFailurePolicy } from '../../app.environment';
import { ConfigurationError } from '../../libs/errors/report.error';
import { ReportConfig } from '../../models/report-config';

const isFetchFailurePolicy = (value: string): value is FetchFailurePolicy =>
  FETCH_FAILURE_POLICIES.some(policy => policy === value);

const MAX_PORT = 65535;

const isPositiveInteger = (value: number) => Number.isInteger(value) && value > 0;

@Injectable()
export class CredentialService {
  constructor(
    private readonly appEnvironment: AppEnvironment
  ) { }

  /**
   * Builds the run configuration once. Every problem is collected so a single
   * ConfigurationError names all of them.
   */
  load(): ReportConfig {
    const env = this.appEnvironment;
    const problems: string[] = [];

    const required: Record<string, string> = {
      NEWS_API_KEY: env.newsApiKey,
      EMAIL_SENDER: env.emailSender,
      EMAIL_PASSWORD: env.emailPassword,
      EMAIL_RECIPIENT: env.emailRecipient,
    };
    const missing = Object.keys(required).filter(key => !required[key]?.trim());
    if (missing.length) problems.push(`missing ${missing.join(', ')}`);

    const symbols = env.trackedAssets.map(symbol => symbol.trim().toUpperCase()).filter(Boolean);
    if (!symbols.length) problems.push('TRACKED_ASSETS is empty');

    if (!isPositiveInteger(env.cryptoNewsLimit)) problems.push('CRYPTO_NEWS_LIMIT must be a positive integer');
    if (!isPositiveInteger(env.politicalNewsLimit)) problems.push('POLITICAL_NEWS_LIMIT must be a positive integer');
    if (!isPositiveInteger(env.httpTimeout)) problems.push('HTTP_TIMEOUT must be a positive integer');
    if (!isPositiveInteger(env.smtpPort) || env.smtpPort > MAX_PORT) problems.push(`SMTP_PORT must be between 1 and ${MAX_PORT}`);
    if (!Number.isInteger(env.timezoneOffset)) problems.push('TIMEZONE_OFFSET must be a whole number of hours');

    const policy = env.fetchFailurePolicy.trim().toLowerCase();
    if (!isFetchFailurePolicy(policy)) {
      problems.push(`FETCH_FAILURE_POLICY must be one of ${FETCH_FAILURE_POLICIES.join(', ')}`);
    }

    if (problems.length || !isFetchFailurePolicy(policy)) throw new ConfigurationError(problems);

    const timeoutMs = env.httpTimeout * 1000;
    const recipients = [env.emailRecipient, env.emailRecipient2]
      .map(recipient => recipient.trim())
      .filter(Boolean);

    return Object.freeze({
      news: Object.freeze({
        apiKey: env.newsApiKey.trim(),
        baseUrl: env.newsApiUrl.replace(/\/+$/, ''),
        language: env.newsLanguage,
        cryptoQuery: env.cryptoNewsQuery,
        politicalQuery: env.politicalNewsQuery,
        cryptoLimit: env.cryptoNewsLimit,
        politicalLimit: env.politicalNewsLimit,
        timeoutMs,
      }),
      market: Object.freeze({
        symbols,
        quoteAsset: env.quoteAsset.trim().toUpperCase(),
        timeoutMs,
      }),
      mail: Object.freeze({
        sender: env.emailSender.trim(),
        password: env.emailPassword,
        recipients,
        smtpHost: env.smtpHost,
        smtpPort: env.smtpPort,
        secure: env.smtpPort === 465,
        timeoutMs,
      }),
      report: Object.freeze({
        title: env.reportTitle,
        timezoneOffset: env.timezoneOffset,
        outputDir: env.logFileDir,
      }),
      fetchFailurePolicy: policy,
    });
  }
}
