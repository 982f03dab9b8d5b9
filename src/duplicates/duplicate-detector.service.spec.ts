import { Test, TestingModule } from '@nestjs/testing';
import { CATALOG_STORE } from '../catalog/interfaces/catalog-store.interface';
import { PipelineError } from '../common/pipeline.error';
import { LEAD_STORE } from '../leads/interfaces/lead-store.interface';
import type { Lead } from '../leads/lead.entity';
import {
  buildOffer,
  buildValidationPolicy,
} from '../../test/support/fixtures';
import { InMemoryLeadExchange } from '../../test/support/in-memory-store';
import { DuplicateDetectorService } from './duplicate-detector.service';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const HOUR_MS = 60 * 60 * 1000;

describe('DuplicateDetectorService', () => {
  let service: DuplicateDetectorService;
  let store: InMemoryLeadExchange;

  const usePolicy = (duplicateDetection?: Record<string, unknown>) => {
    store.validationPolicies = [
      buildValidationPolicy(
        duplicateDetection === undefined
          ? { rules: [] }
          : { rules: [], duplicate_detection: duplicateDetection },
      ),
    ];
  };

  /** An earlier lead with the default contact data, already normalized */
  const seedEarlier = (ageMs: number, overrides: Partial<Lead> = {}) =>
    store.seedLead({
      id: 1,
      status: 'validated',
      normalizedPhone: '5125550123',
      normalizedEmail: 'pat@example.com',
      createdAt: new Date(NOW.getTime() - ageMs),
      ...overrides,
    });

  beforeEach(async () => {
    store = new InMemoryLeadExchange();
    store.offers = [buildOffer()];
    store.now = () => NOW;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DuplicateDetectorService,
        { provide: LEAD_STORE, useValue: store },
        { provide: CATALOG_STORE, useValue: store },
      ],
    }).compile();

    service = module.get<DuplicateDetectorService>(DuplicateDetectorService);
  });

  it('rejects a lead matching an earlier lead inside the window', async () => {
    usePolicy({ enabled: true, window_hours: 24 });
    seedEarlier(2 * HOUR_MS);
    store.seedLead({ id: 2 });

    const result = await service.detect(2, NOW);

    expect(result).toEqual({
      isDuplicate: true,
      action: 'reject',
      matchedLeadId: 1,
      matchedKeys: ['phone', 'email'],
    });
    const lead = store.lead(2);
    expect(lead.status).toBe('rejected');
    expect(lead.validationReason).toBe('duplicate_lead');
    expect(lead.isDuplicate).toBe(true);
    expect(lead.duplicateOfLeadId).toBe(1);
  });

  it('matches a lead created exactly at the window start', async () => {
    usePolicy({ enabled: true, window_hours: 24 });
    seedEarlier(24 * HOUR_MS);
    store.seedLead({ id: 2 });

    const result = await service.detect(2, NOW);

    expect(result.matchedLeadId).toBe(1);
  });

  it('ignores a lead created just before the window start', async () => {
    usePolicy({ enabled: true, window_hours: 24 });
    seedEarlier(24 * HOUR_MS + 1);
    store.seedLead({ id: 2, phone: '(512) 555-0123' });

    const result = await service.detect(2, NOW);

    expect(result.isDuplicate).toBe(false);
    expect(store.lead(2).status).toBe('received');
    expect(store.lead(2).normalizedPhone).toBe('5125550123');
  });

  it('normalizes contact data even when detection is disabled', async () => {
    usePolicy();
    seedEarlier(HOUR_MS);
    store.seedLead({ id: 2, email: ' PAT@Example.com ' });

    const result = await service.detect(2, NOW);

    expect(result.isDuplicate).toBe(false);
    expect(store.lead(2).normalizedEmail).toBe('pat@example.com');
  });

  it('flags without rejecting when the action is flag', async () => {
    usePolicy({ enabled: true, action: 'flag' });
    seedEarlier(HOUR_MS);
    store.seedLead({ id: 2 });

    const result = await service.detect(2, NOW);

    expect(result.action).toBe('flag');
    expect(store.lead(2).status).toBe('received');
    expect(store.lead(2).duplicateOfLeadId).toBe(1);
  });

  it('flags and rejects in a single store write', async () => {
    usePolicy({ enabled: true });
    seedEarlier(HOUR_MS);
    store.seedLead({ id: 2 });
    const markDuplicate = jest.spyOn(store, 'markDuplicate');
    const markRejected = jest.spyOn(store, 'markRejected');

    await service.detect(2, NOW);

    expect(markDuplicate).toHaveBeenCalledTimes(1);
    expect(markDuplicate).toHaveBeenCalledWith(2, 1, 'duplicate_lead');
    expect(markRejected).not.toHaveBeenCalled();
  });

  it('writes nothing when the lead leaves received before the rejection', async () => {
    usePolicy({ enabled: true });
    seedEarlier(HOUR_MS);
    store.seedLead({ id: 2 });
    jest.spyOn(store, 'findLatestDuplicate').mockImplementation(async () => {
      store.lead(2).status = 'validated';
      return {
        leadId: 1,
        createdAt: new Date(NOW.getTime() - HOUR_MS),
        normalizedPhone: '5125550123',
        normalizedEmail: 'pat@example.com',
      };
    });

    await service.detect(2, NOW);

    const lead = store.lead(2);
    expect(lead.status).toBe('validated');
    expect(lead.isDuplicate).toBe(false);
    expect(lead.duplicateOfLeadId).toBeNull();
    expect(lead.validationReason).toBeNull();
  });

  it('skips leads in excluded statuses', async () => {
    usePolicy({ enabled: true });
    seedEarlier(HOUR_MS, { status: 'rejected' });
    store.seedLead({ id: 2 });

    await expect(service.detect(2, NOW)).resolves.toMatchObject({
      isDuplicate: false,
    });
  });

  it('requires every key to match in all mode', async () => {
    seedEarlier(HOUR_MS, { normalizedEmail: 'other@example.com' });
    store.seedLead({ id: 2 });

    usePolicy({ enabled: true, match_mode: 'all', action: 'flag' });
    await expect(service.detect(2, NOW)).resolves.toMatchObject({
      isDuplicate: false,
    });

    usePolicy({ enabled: true, match_mode: 'any', action: 'flag' });
    await expect(service.detect(2, NOW)).resolves.toMatchObject({
      isDuplicate: true,
      matchedKeys: ['phone'],
    });
  });

  it('only compares the configured keys', async () => {
    usePolicy({ enabled: true, keys: ['email'] });
    seedEarlier(HOUR_MS, { normalizedEmail: 'other@example.com' });
    store.seedLead({ id: 2 });

    await expect(service.detect(2, NOW)).resolves.toMatchObject({
      isDuplicate: false,
    });
  });

  it('restricts matches to the same source when configured', async () => {
    usePolicy({ enabled: true, include_sources: 'same_source_only' });
    seedEarlier(HOUR_MS, { sourceId: 2 });
    store.seedLead({ id: 2 });

    await expect(service.detect(2, NOW)).resolves.toMatchObject({
      isDuplicate: false,
    });
  });

  it('skips the check when a required field is missing', async () => {
    usePolicy({ enabled: true, min_fields: ['email'] });
    seedEarlier(HOUR_MS);
    store.seedLead({ id: 2, email: null });

    await expect(service.detect(2, NOW)).resolves.toMatchObject({
      isDuplicate: false,
    });
  });

  it('leaves a lead past the received status untouched', async () => {
    usePolicy({ enabled: true });
    seedEarlier(HOUR_MS);
    store.seedLead({ id: 2, status: 'validated' });

    await expect(service.detect(2, NOW)).resolves.toMatchObject({
      isDuplicate: false,
    });
    expect(store.lead(2).normalizedPhone).toBeNull();
  });

  it('rejects an out-of-range window', async () => {
    usePolicy({ enabled: true, window_hours: 0 });
    store.seedLead({ id: 2 });

    await expect(service.detect(2, NOW)).rejects.toMatchObject({
      code: 'invalid_window_hours',
      httpStatus: 422,
    });
    await expect(service.detect(2, NOW)).rejects.toBeInstanceOf(PipelineError);
  });
});
