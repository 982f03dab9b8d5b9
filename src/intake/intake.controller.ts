import {
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
  Req,
} from '@nestjs/common';
import type { Request } from 'express';
import { IngestLeadDto } from './dto/ingest-lead.dto';
import { IngestResponse, IntakeService } from './intake.service';

@Controller('leads')
export class IntakeController {
  constructor(private readonly intakeService: IntakeService) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  ingest(
    @Body() body: IngestLeadDto,
    @Req() req: Request,
    @Headers('host') host?: string,
  ): Promise<IngestResponse> {
    return this.intakeService.ingest({
      classification: {
        sourceId: body.source_id,
        sourceKey: body.source_key,
        host,
        path: req.path,
      },
      submission: {
        idempotencyKey: body.idempotency_key,
        source: body.source,
        name: body.name,
        email: body.email,
        phone: body.phone,
        countryCode: body.country_code,
        postalCode: body.postal_code,
        city: body.city,
        regionCode: body.region_code,
        message: body.message,
        utmSource: body.utm_source,
        utmMedium: body.utm_medium,
        utmCampaign: body.utm_campaign,
        ipAddress: req.ip,
        userAgent: req.get('user-agent'),
      },
    });
  }
}
