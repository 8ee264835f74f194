import { Inject, Injectable } from '@nestjs/common';
import { LogService } from '../log/log.service';
import { MAIL_TRANSPORT_FACTORY, MailTransportFactory } from './mail-transport';
import { DeliveryError, errorCode, errorMessage } from '../../libs/errors/report.error';
import { MailConfig } from '../../models/report-config';
import { Report } from '../../models/report';

const REJECTED_CODE = 'EENVELOPE';

@Injectable()
export class MailerService {
  constructor(
    private readonly logService: LogService,
    @Inject(MAIL_TRANSPORT_FACTORY) private readonly createTransport: MailTransportFactory
  ) { }

  /**
   * Verifies the authenticated session before sending, so a login failure delivers nothing.
   * Any rejected recipient fails the delivery.
   */
  async send(config: MailConfig, report: Report) {
    const { sender, recipients, smtpHost, smtpPort } = config;
    if (!recipients.length) throw new DeliveryError('no recipients configured');

    const transport = this.createTransport(config);
    try {
      await transport.verify();
      const info = await transport.sendMail({
        from: sender,
        to: recipients,
        subject: report.subject,
        html: report.html,
        text: report.text,
      });

      const rejected = info.rejected ?? [];
      if (rejected.length) {
        const addresses = rejected.map(address => typeof address === 'string' ? address : address.address);
        throw new DeliveryError(`recipients rejected: ${addresses.join(', ')}`, { code: REJECTED_CODE });
      }
      this.logService.log(`Report "${report.subject}" sent to ${recipients.join(', ')}`, `messageId: ${info.messageId}`);
      return info;
    } catch (e) {
      if (e instanceof DeliveryError) throw e;
      const code = errorCode(e);
      const reason = code === 'EAUTH'
        ? `authentication failed for ${sender} on ${smtpHost}:${smtpPort}`
        : errorMessage(e);
      throw new DeliveryError(reason, { code: code === undefined ? undefined : String(code), cause: e });
    } finally {
      transport.close();
    }
  }
}
