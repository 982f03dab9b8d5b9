import { Test, TestingModule } from '@nestjs/testing';
import { UnrecoverableError } from 'bullmq';
import { LeadNotFoundError } from '../common/pipeline.error';
import { DeliveryEngine, DeliveryOutcome } from './delivery.engine';
import {
  deliveryBackoff,
  DeliveryProcessor,
  deliveryWorkerOptions,
} from './delivery.processor';

describe('DeliveryProcessor', () => {
  let processor: DeliveryProcessor;
  let mockEngine: { deliver: jest.Mock };

  const job = (attemptsMade = 0) => ({
    id: 'lead-7',
    data: { leadId: 7, retryDelaysMs: [0, 5000, 15000] },
    attemptsMade,
  });

  const outcome = (overrides: Partial<DeliveryOutcome>): DeliveryOutcome => ({
    leadId: 7,
    success: false,
    retryable: true,
    status: 'validated',
    attempts: [],
    error: null,
    ...overrides,
  });

  beforeEach(async () => {
    mockEngine = { deliver: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DeliveryProcessor,
        { provide: DeliveryEngine, useValue: mockEngine },
      ],
    }).compile();

    processor = module.get<DeliveryProcessor>(DeliveryProcessor);
  });

  it('passes the 1-based attempt number to the engine', async () => {
    const delivered = outcome({ success: true, retryable: false, status: 'delivered' });
    mockEngine.deliver.mockResolvedValue(delivered);

    await expect(processor.process(job(2))).resolves.toBe(delivered);
    expect(mockEngine.deliver).toHaveBeenCalledWith(7, 3);
  });

  it('throws a retryable error when every channel failed', async () => {
    mockEngine.deliver.mockResolvedValue(outcome({ error: 'HTTP 503: down' }));

    const error = await processor.process(job()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    expect(error).not.toBeInstanceOf(UnrecoverableError);
    expect(error).toHaveProperty(
      'message',
      'Delivery attempt 1 for lead 7 failed: HTTP 503: down',
    );
  });

  it('fails without retry when the engine says retrying is pointless', async () => {
    mockEngine.deliver.mockResolvedValue(
      outcome({ retryable: false, error: 'no_delivery_channel' }),
    );

    await expect(processor.process(job())).rejects.toBeInstanceOf(UnrecoverableError);
  });

  it('turns pipeline errors into unrecoverable failures', async () => {
    mockEngine.deliver.mockRejectedValue(new LeadNotFoundError(7));

    await expect(processor.process(job())).rejects.toThrow(
      new UnrecoverableError('lead_not_found: Lead 7 not found'),
    );
  });

  it('lets infrastructure errors through for a retry', async () => {
    const outage = new Error('connection terminated');
    mockEngine.deliver.mockRejectedValue(outage);

    await expect(processor.process(job())).rejects.toBe(outage);
  });

  it('rejects a job without a lead id', async () => {
    await expect(
      processor.process({ id: 'lead-x', data: { foo: 1 }, attemptsMade: 0 }),
    ).rejects.toBeInstanceOf(UnrecoverableError);
    expect(mockEngine.deliver).not.toHaveBeenCalled();
  });
});

describe('deliveryBackoff', () => {
  const job = { data: { leadId: 7, retryDelaysMs: [0, 5000, 15000] } };

  it('uses the delay for the upcoming attempt', () => {
    expect(deliveryBackoff(1, 'custom', undefined, job)).toBe(5000);
    expect(deliveryBackoff(2, 'custom', undefined, job)).toBe(15000);
  });

  it('repeats the last delay past the end of the schedule', () => {
    expect(deliveryBackoff(5, 'custom', undefined, job)).toBe(15000);
  });

  it('retries immediately without a schedule', () => {
    expect(deliveryBackoff(1, 'custom', undefined, { data: {} })).toBe(0);
  });
});

describe('deliveryWorkerOptions', () => {
  it('takes the lock duration from the visibility timeout', () => {
    expect(
      deliveryWorkerOptions({
        DELIVERY_CONCURRENCY: '4',
        DELIVERY_VISIBILITY_TIMEOUT_MS: '120000',
      }),
    ).toEqual({ concurrency: 4, lockDuration: 120000, lockRenewTime: 60000 });
  });

  it('falls back to the defaults', () => {
    expect(deliveryWorkerOptions({})).toEqual({
      concurrency: 10,
      lockDuration: 30000,
      lockRenewTime: 15000,
    });
  });

  it('rejects a visibility timeout below one second', () => {
    expect(() =>
      deliveryWorkerOptions({ DELIVERY_VISIBILITY_TIMEOUT_MS: '500' }),
    ).toThrow();
  });

  it('hands the options to the worker the processor creates', () => {
    const workerOptions: unknown = Reflect.getMetadata(
      'bullmq:worker_metadata',
      DeliveryProcessor,
    );

    expect(workerOptions).toEqual({
      ...deliveryWorkerOptions(process.env),
      settings: { backoffStrategy: deliveryBackoff },
    });
  });
});
