import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { PipelineError } from './pipeline.error';

@Catch(PipelineError)
export class PipelineExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(PipelineExceptionFilter.name);

  catch(exception: PipelineError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    this.logger.warn(`${exception.code}: ${exception.message}`);
    response.status(exception.httpStatus).json(exception.toJSON());
  }
}
