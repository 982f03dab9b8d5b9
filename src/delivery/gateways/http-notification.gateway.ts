import { Logger } from '@nestjs/common';
import { ChannelHttpError } from '../delivery.error';
import type {
  NotificationGateway,
  NotificationMessage,
} from '../interfaces/notification-gateway.interface';

/** Posts messages as JSON to a relay service (SMTP bridge, SMS provider) */
export class HttpNotificationGateway implements NotificationGateway {
  private readonly logger = new Logger(HttpNotificationGateway.name);

  constructor(
    private readonly kind: 'email' | 'sms',
    private readonly url: string,
    private readonly timeoutMs: number,
  ) {}

  async send(message: NotificationMessage): Promise<void> {
    const response = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        channel: this.kind,
        lead_id: message.leadId,
        to: message.to,
        subject: message.subject,
        body: message.body,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      this.logger.warn(
        `${this.kind} gateway refused lead ${message.leadId} with HTTP ${response.status}`,
      );
      throw new ChannelHttpError(response.status, text);
    }
  }
}
