export interface NotificationMessage {
  leadId: number;
  to: string;
  subject: string;
  body: string;
}

/**
 * Outbound email or SMS transport. `send` resolves once the provider has
 * accepted the message and rejects otherwise.
 */
export interface NotificationGateway {
  send(message: NotificationMessage): Promise<void>;
}

export const EMAIL_GATEWAY = 'EMAIL_GATEWAY';
export const SMS_GATEWAY = 'SMS_GATEWAY';
