import { Env } from '@nestjs-steroids/environment';
import { Transform } from 'class-transformer';
import { IsArray, IsEnum, IsNumber, IsString } from 'class-validator';

export enum NodeEnvironment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

export const FETCH_FAILURE_POLICIES = ['degrade', 'abort'] as const;

export type FetchFailurePolicy = typeof FETCH_FAILURE_POLICIES[number];

const parseInteger = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? Number.parseInt(value, 10) : value;

const parseList = ({ value }: { value: unknown }) =>
  typeof value === 'string'
    ? value.split(',').map(item => item.trim()).filter(item => item.length > 0)
    : value;

export class AppEnvironment {
  /**
   * Env decorator mark environment variable that we want to assign.
   * Values left blank here are required and checked by CredentialService,
   * as are the ranges of numeric values (NaN included), so both surface as a
   * ConfigurationError instead of a bootstrap failure.
   */
  @Env('NODE_ENV')
  @IsEnum(NodeEnvironment)
  readonly nodeEnvironment: NodeEnvironment = NodeEnvironment.Development;

  isDevelopment() {
    return this.nodeEnvironment === NodeEnvironment.Development;
  }

  isTest() {
    return this.nodeEnvironment === NodeEnvironment.Test;
  }

  @Env('NEWS_API_KEY')
  @IsString()
  readonly newsApiKey: string = '';

  @Env('NEWS_API_URL')
  @IsString()
  readonly newsApiUrl: string = 'https://newsapi.org/v2';

  @Env('NEWS_LANGUAGE')
  @IsString()
  readonly newsLanguage: string = 'en';

  @Env('CRYPTO_NEWS_QUERY')
  @IsString()
  readonly cryptoNewsQuery: string = 'cryptocurrency OR bitcoin OR ethereum';

  @Env('POLITICAL_NEWS_QUERY')
  @IsString()
  readonly politicalNewsQuery: string = '(regulation OR policy OR government) AND (cryptocurrency OR bitcoin OR crypto)';

  @Env('CRYPTO_NEWS_LIMIT')
  @Transform(parseInteger)
  @IsNumber({ allowNaN: true })
  readonly cryptoNewsLimit: number = 10;

  @Env('POLITICAL_NEWS_LIMIT')
  @Transform(parseInteger)
  @IsNumber({ allowNaN: true })
  readonly politicalNewsLimit: number = 5;

  /**
   * Base assets priced against quoteAsset, ex: BTC,ETH,SOL,TIA
   */
  @Env('TRACKED_ASSETS')
  @Transform(parseList)
  @IsArray()
  readonly trackedAssets: string[] = ['BTC', 'ETH', 'SOL', 'TIA'];

  @Env('QUOTE_ASSET')
  @IsString()
  readonly quoteAsset: string = 'USDT';

  @Env('EMAIL_SENDER')
  @IsString()
  readonly emailSender: string = '';

  @Env('EMAIL_PASSWORD')
  @IsString()
  readonly emailPassword: string = '';

  @Env('EMAIL_RECIPIENT')
  @IsString()
  readonly emailRecipient: string = '';

  @Env('EMAIL_RECIPIENT2')
  @IsString()
  readonly emailRecipient2: string = '';

  @Env('SMTP_HOST')
  @IsString()
  readonly smtpHost: string = 'smtp.gmail.com';

  @Env('SMTP_PORT')
  @Transform(parseInteger)
  @IsNumber({ allowNaN: true })
  readonly smtpPort: number = 465;

  /**
   * Seconds. Applies to every news, market and SMTP call.
   */
  @Env('HTTP_TIMEOUT')
  @Transform(parseInteger)
  @IsNumber({ allowNaN: true })
  readonly httpTimeout: number = 10;

  @Env('FETCH_FAILURE_POLICY')
  @IsString()
  readonly fetchFailurePolicy: string = 'degrade';

  @Env('REPORT_TITLE')
  @IsString()
  readonly reportTitle: string = 'Crypto Daily Report';

  @Env('DATA_DIR')
  @Transform(({ value }) => value ? `./${value}` : './data')
  @IsString()
  readonly logFileDir: string = './data';

  @Env('TIMEZONE_OFFSET')
  @Transform(parseInteger)
  @IsNumber({ allowNaN: true })
  readonly timezoneOffset: number = 0;

  readonly dateTimeFormat = 'YYYY-MM-DD HH:mm:ss';
}
