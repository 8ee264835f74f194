import { Module } from '@nestjs/common';
import { EnvironmentModule } from '@nestjs-steroids/environment';
import { ScheduleModule } from '@nestjs/schedule';
import { AppEnvironment } from './app.environment';
import { CredentialService } from './services/credential/credential.service';
import { LogService } from './services/log/log.service';
import { MailerService } from './services/mailer/mailer.service';
import { MAIL_TRANSPORT_FACTORY, createSmtpTransport } from './services/mailer/mail-transport';
import { MarketService } from './services/market/market.service';
import { NewsService } from './services/news/news.service';
import { ReportService } from './services/report/report.service';
import { SchedulerService } from './services/scheduler/scheduler.service';

@Module({
  imports: [
    EnvironmentModule.forRoot({
      isGlobal: true,
      loadEnvFile: true,
      useClass: AppEnvironment,
    }),
    ScheduleModule.forRoot(),
  ],
  providers: [
    LogService,
    CredentialService,
    NewsService,
    MarketService,
    MailerService,
    { provide: MAIL_TRANSPORT_FACTORY, useValue: createSmtpTransport },
    ReportService,
    SchedulerService,
  ],
})
export class AppModule { }
