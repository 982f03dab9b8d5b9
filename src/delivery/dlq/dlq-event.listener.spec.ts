import { getQueueToken } from '@nestjs/bullmq';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { DELIVERY_DLQ, DELIVERY_QUEUE } from '../delivery.constants';
import { DlqEventListener } from './dlq-event.listener';

describe('DlqEventListener', () => {
  let listener: DlqEventListener;
  let mockQueue: { getJob: jest.Mock };
  let mockDlq: { add: jest.Mock };

  const failedJob = (state: string) => ({
    data: { leadId: 7, retryDelaysMs: [0, 5000, 15000] },
    attemptsMade: 3,
    finishedOn: 1767225600000,
    getState: jest.fn().mockResolvedValue(state),
  });

  beforeEach(async () => {
    mockQueue = { getJob: jest.fn() };
    mockDlq = { add: jest.fn().mockResolvedValue({ id: 'dlq-1' }) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DlqEventListener,
        { provide: getQueueToken(DELIVERY_QUEUE), useValue: mockQueue },
        { provide: getQueueToken(DELIVERY_DLQ), useValue: mockDlq },
        { provide: ConfigService, useValue: { get: jest.fn() } },
      ],
    }).compile();

    listener = module.get<DlqEventListener>(DlqEventListener);
  });

  it('dead-letters a job that failed for good', async () => {
    mockQueue.getJob.mockResolvedValue(failedJob('failed'));

    await expect(
      listener.handleFailedJob('lead-7', 'Delivery attempt 3 for lead 7 failed: HTTP 503: down'),
    ).resolves.toBe(true);

    expect(mockDlq.add).toHaveBeenCalledWith(
      'dead-letter',
      {
        originalJobId: 'lead-7',
        leadId: 7,
        failedAt: '2026-01-01T00:00:00.000Z',
        error: 'Delivery attempt 3 for lead 7 failed: HTTP 503: down',
        attemptsMade: 3,
      },
      { jobId: 'lead-7-1767225600000' },
    );
  });

  it('ignores a failure that will be retried', async () => {
    mockQueue.getJob.mockResolvedValue(failedJob('delayed'));

    await expect(listener.handleFailedJob('lead-7', 'HTTP 503')).resolves.toBe(false);
    expect(mockDlq.add).not.toHaveBeenCalled();
  });

  it('ignores a job that is gone', async () => {
    mockQueue.getJob.mockResolvedValue(undefined);

    await expect(listener.handleFailedJob('lead-7', 'HTTP 503')).resolves.toBe(false);
    expect(mockDlq.add).not.toHaveBeenCalled();
  });
});
