import {
  Controller,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  DefaultValuePipe,
  ParseIntPipe,
} from '@nestjs/common';
import { CircuitBreakerFactory, CircuitHealth } from '../common/circuit-breaker.factory';
import { DeliveryQueueService, QueueStats } from './delivery-queue.service';
import { DeadLetterService } from './dlq/dead-letter.service';
import { DeliveryDeadLetter } from './dlq/dead-letter.entity';

/** Operator endpoints for the delivery queue and its dead letters */
@Controller('delivery')
export class DeliveryController {
  constructor(
    private readonly deliveryQueue: DeliveryQueueService,
    private readonly deadLetters: DeadLetterService,
    private readonly breakers: CircuitBreakerFactory,
  ) {}

  @Get('queue')
  getQueueStats(): Promise<QueueStats> {
    return this.deliveryQueue.getStats();
  }

  @Post('queue/purge')
  @HttpCode(200)
  async purgeStale(): Promise<{ removed: number }> {
    return { removed: await this.deliveryQueue.purgeStale() };
  }

  @Get('circuits')
  getCircuits(): Record<string, CircuitHealth> {
    return this.breakers.health();
  }

  @Get('dead-letters')
  listDeadLetters(
    @Query('limit', new DefaultValuePipe(100), ParseIntPipe) limit: number,
  ): Promise<DeliveryDeadLetter[]> {
    return this.deadLetters.list(limit);
  }

  @Post('dead-letters/reprocess')
  @HttpCode(200)
  async reprocessAll(): Promise<{ requeued: number }> {
    return { requeued: await this.deadLetters.reprocessAll() };
  }

  @Post('dead-letters/:id/reprocess')
  @HttpCode(200)
  async reprocess(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<{ requeued: boolean }> {
    return { requeued: await this.deadLetters.reprocess(id) };
  }
}
