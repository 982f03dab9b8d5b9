import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { createHmac } from 'crypto';
import { CircuitBreakerFactory } from '../../common/circuit-breaker.factory';
import { buildLead } from '../../../test/support/fixtures';
import { buildDeliveryPayload, DeliveryPayload } from '../delivery-payload';
import type { DeliveryTarget } from '../interfaces/delivery-channel.interface';
import { WebhookChannel } from './webhook.channel';

describe('WebhookChannel', () => {
  let module: TestingModule;
  let channel: WebhookChannel;
  let fetchMock: jest.SpyInstance;
  let payload: DeliveryPayload;

  const target: DeliveryTarget = {
    buyerId: 1,
    webhookUrl: 'https://hooks.acme.test/leads',
    webhookSecret: 'test-secret',
    email: null,
    phone: null,
  };

  const requestInit = (call = 0): RequestInit => fetchMock.mock.calls[call][1];

  beforeEach(async () => {
    const settings: Record<string, unknown> = {
      WEBHOOK_TIMEOUT_MS: 5000,
      WEBHOOK_USER_AGENT: 'test-agent/1.0',
    };
    module = await Test.createTestingModule({
      providers: [
        WebhookChannel,
        CircuitBreakerFactory,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string, fallback?: unknown) => settings[key] ?? fallback),
          },
        },
      ],
    }).compile();

    channel = module.get<WebhookChannel>(WebhookChannel);
    fetchMock = jest.spyOn(global, 'fetch');
    payload = buildDeliveryPayload(
      buildLead({ id: 7 }),
      new Date('2026-03-01T12:00:00.000Z'),
    );
  });

  afterEach(async () => {
    fetchMock.mockRestore();
    await module.close();
  });

  it('posts the canonical body with a signature over it', async () => {
    fetchMock.mockResolvedValue(new Response('ok', { status: 202 }));

    const result = await channel.send(target, payload, 'delivery-1');

    expect(result).toEqual({ success: true, httpStatus: 202, errorMessage: null });
    expect(fetchMock).toHaveBeenCalledWith(
      'https://hooks.acme.test/leads',
      expect.objectContaining({ method: 'POST' }),
    );

    const init = requestInit();
    const body = String(init.body);
    expect(Object.keys(JSON.parse(body))).toEqual([
      'contact',
      'idempotency_key',
      'lead_id',
      'location',
      'source',
      'timestamp',
    ]);
    const signature = createHmac('sha256', 'test-secret').update(body).digest('hex');
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      'User-Agent': 'test-agent/1.0',
      'X-Delivery-Id': 'delivery-1',
      'X-Webhook-Signature': `sha256=${signature}`,
    });
  });

  it('sends no signature header without a secret', async () => {
    fetchMock.mockResolvedValue(new Response('ok', { status: 200 }));

    await channel.send({ ...target, webhookSecret: null }, payload, 'delivery-1');

    expect(requestInit().headers).not.toHaveProperty('X-Webhook-Signature');
  });

  it('reports a non-2xx answer with the start of the body', async () => {
    fetchMock.mockResolvedValue(
      new Response(`upstream exploded ${'x'.repeat(300)}`, { status: 503 }),
    );

    const result = await channel.send(target, payload, 'delivery-1');

    expect(result.success).toBe(false);
    expect(result.httpStatus).toBe(503);
    expect(result.errorMessage).toBe(
      `HTTP 503: upstream exploded ${'x'.repeat(182)}`,
    );
  });

  it('reports a timeout', async () => {
    fetchMock.mockRejectedValue(
      Object.assign(new Error('The operation was aborted due to timeout'), {
        name: 'TimeoutError',
      }),
    );

    await expect(channel.send(target, payload, 'delivery-1')).resolves.toEqual({
      success: false,
      httpStatus: null,
      errorMessage: 'Request timeout',
    });
  });

  it('opens the breaker for a host after repeated server errors', async () => {
    fetchMock.mockImplementation(async () => new Response('down', { status: 503 }));

    for (let i = 0; i < 10; i++) {
      await channel.send(target, payload, `delivery-${i}`);
    }
    const blocked = await channel.send(target, payload, 'delivery-10');

    expect(fetchMock).toHaveBeenCalledTimes(10);
    expect(blocked).toEqual({
      success: false,
      httpStatus: null,
      errorMessage: 'Breaker is open',
    });
    expect(module.get(CircuitBreakerFactory).health()['webhook:hooks.acme.test']).toMatchObject({
      state: 'OPEN',
      failures: 10,
    });

    fetchMock.mockImplementation(async () => new Response('ok', { status: 200 }));
    const otherHost = await channel.send(
      { ...target, webhookUrl: 'https://hooks.other.test/in' },
      payload,
      'delivery-11',
    );
    expect(otherHost.success).toBe(true);
  });

  it('keeps the breaker closed on client errors', async () => {
    fetchMock.mockImplementation(async () => new Response('bad lead', { status: 422 }));

    for (let i = 0; i < 12; i++) {
      await channel.send(target, payload, `delivery-${i}`);
    }

    expect(fetchMock).toHaveBeenCalledTimes(12);
  });

  it('rejects an unparseable webhook URL without calling out', async () => {
    const result = await channel.send(
      { ...target, webhookUrl: 'not a url' },
      payload,
      'delivery-1',
    );

    expect(result).toEqual({
      success: false,
      httpStatus: null,
      errorMessage: 'Invalid webhook URL for buyer 1',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
