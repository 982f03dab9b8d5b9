import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BillingModule } from '../billing/billing.module';
import { CatalogModule } from '../catalog/catalog.module';
import { CircuitBreakerFactory } from '../common/circuit-breaker.factory';
import { PIIRedactor } from '../common/pii-redactor';
import { LeadsModule } from '../leads/leads.module';
import { EmailChannel } from './channels/email.channel';
import { SmsChannel } from './channels/sms.channel';
import { WebhookChannel } from './channels/webhook.channel';
import { DeliveryController } from './delivery.controller';
import { DELIVERY_DLQ, DELIVERY_QUEUE } from './delivery.constants';
import { DeliveryEngine } from './delivery.engine';
import { DeliveryMaintenanceService } from './delivery-maintenance.service';
import { DeliveryProcessor } from './delivery.processor';
import { DeliveryQueueService } from './delivery-queue.service';
import { DeliveryDeadLetter } from './dlq/dead-letter.entity';
import { DeadLetterService } from './dlq/dead-letter.service';
import { DlqEventListener } from './dlq/dlq-event.listener';
import { DlqProcessor } from './dlq/dlq.processor';
import { HttpNotificationGateway } from './gateways/http-notification.gateway';
import { LogNotificationGateway } from './gateways/log-notification.gateway';
import { DELIVERY_CHANNELS } from './interfaces/delivery-channel.interface';
import {
  EMAIL_GATEWAY,
  NotificationGateway,
  SMS_GATEWAY,
} from './interfaces/notification-gateway.interface';

function gatewayFactory(kind: 'email' | 'sms') {
  return (configService: ConfigService, redactor: PIIRedactor): NotificationGateway => {
    const prefix = kind === 'email' ? 'EMAIL' : 'SMS';
    const provider = configService.get<string>(`${prefix}_PROVIDER`, 'log');
    const url = configService.get<string>(`${prefix}_GATEWAY_URL`);
    // validateEnv guarantees the URL whenever the provider is http
    if (provider === 'http' && url) {
      return new HttpNotificationGateway(
        kind,
        url,
        configService.get<number>('WEBHOOK_TIMEOUT_MS', 10000),
      );
    }
    return new LogNotificationGateway(kind, redactor);
  };
}

@Module({
  imports: [
    ConfigModule,
    LeadsModule,
    CatalogModule,
    BillingModule,
    TypeOrmModule.forFeature([DeliveryDeadLetter]),
    BullModule.registerQueue({ name: DELIVERY_QUEUE }, { name: DELIVERY_DLQ }),
  ],
  controllers: [DeliveryController],
  providers: [
    PIIRedactor,
    CircuitBreakerFactory,

    // Notification gateways - selected by EMAIL_PROVIDER / SMS_PROVIDER
    {
      provide: EMAIL_GATEWAY,
      useFactory: gatewayFactory('email'),
      inject: [ConfigService, PIIRedactor],
    },
    {
      provide: SMS_GATEWAY,
      useFactory: gatewayFactory('sms'),
      inject: [ConfigService, PIIRedactor],
    },

    // Channels, in fallback order
    WebhookChannel,
    EmailChannel,
    SmsChannel,
    {
      provide: DELIVERY_CHANNELS,
      useFactory: (webhook: WebhookChannel, email: EmailChannel, sms: SmsChannel) => [
        webhook,
        email,
        sms,
      ],
      inject: [WebhookChannel, EmailChannel, SmsChannel],
    },

    DeliveryEngine,
    DeliveryQueueService,
    DeliveryProcessor,
    DeadLetterService,
    DlqEventListener,
    DlqProcessor,
    DeliveryMaintenanceService,
  ],
  exports: [DeliveryQueueService, DeliveryEngine, DeadLetterService],
})
export class DeliveryModule {}
