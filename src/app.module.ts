import { AppConfigModule } from './config/app-config.module';
import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BullModule } from '@nestjs/bullmq';
import { MetricsModule } from './common/metrics.module';
import { CatalogModule } from './catalog/catalog.module';
import { LeadsModule } from './leads/leads.module';
import { ClassificationModule } from './classification/classification.module';
import { AdmissionModule } from './admission/admission.module';
import { DuplicatesModule } from './duplicates/duplicates.module';
import { ValidationModule } from './validation/validation.module';
import { RoutingModule } from './routing/routing.module';
import { BillingModule } from './billing/billing.module';
import { DeliveryModule } from './delivery/delivery.module';
import { IntakeModule } from './intake/intake.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    AppConfigModule,
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        pinoHttp: {
          level: configService.get<string>('LOG_LEVEL', 'info'),
          transport:
            configService.get<string>('NODE_ENV') !== 'production'
              ? { target: 'pino-pretty', options: { colorize: true } }
              : undefined,
          redact: [
            'req.body.email',
            'req.body.phone',
            'req.body.name',
            'req.headers.authorization',
          ],
        },
      }),
    }),
    PrometheusModule.register({
      path: '/metrics',
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        url: configService.get<string>('DATABASE_URL'),
        autoLoadEntities: true,
        // development only; production schemas are managed outside the app
        synchronize: configService.get<boolean>('DB_SYNCHRONIZE', false),
      }),
      inject: [ConfigService],
    }),
    BullModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        connection: {
          host: configService.get<string>('REDIS_HOST'),
          port: configService.get<number>('REDIS_PORT'),
        },
      }),
      inject: [ConfigService],
    }),
    MetricsModule,
    CatalogModule,
    LeadsModule,
    ClassificationModule,
    AdmissionModule,
    DuplicatesModule,
    ValidationModule,
    RoutingModule,
    BillingModule,
    DeliveryModule,
    IntakeModule,
    HealthModule,
  ],
})
export class AppModule {}
