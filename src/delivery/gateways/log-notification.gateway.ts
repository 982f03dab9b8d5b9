import { Logger } from '@nestjs/common';
import { PIIRedactor } from '../../common/pii-redactor';
import type {
  NotificationGateway,
  NotificationMessage,
} from '../interfaces/notification-gateway.interface';

/**
 * Development gateway: logs the message with the recipient masked and
 * reports it as sent.
 */
export class LogNotificationGateway implements NotificationGateway {
  private readonly logger = new Logger(LogNotificationGateway.name);

  constructor(
    private readonly kind: 'email' | 'sms',
    private readonly redactor: PIIRedactor,
  ) {}

  send(message: NotificationMessage): Promise<void> {
    const recipient =
      this.kind === 'email'
        ? this.redactor.maskEmail(message.to)
        : this.redactor.maskPhone(message.to);
    this.logger.log(
      `[${this.kind}] lead ${message.leadId} -> ${recipient}: ${message.subject}`,
    );
    return Promise.resolve();
  }
}
