import { Test, TestingModule } from '@nestjs/testing';
import { CATALOG_STORE } from '../catalog/interfaces/catalog-store.interface';
import { buildOffer, buildSource } from '../../test/support/fixtures';
import { InMemoryLeadExchange } from '../../test/support/in-memory-store';
import { ClassificationError } from './classification.error';
import {
  canonicalizeHostname,
  canonicalizePath,
  ClassificationService,
} from './classification.service';

describe('ClassificationService', () => {
  let service: ClassificationService;
  let store: InMemoryLeadExchange;

  const attributionFor = (sourceId: number) => ({
    sourceId,
    offerId: 10,
    marketId: 100,
    verticalId: 200,
  });

  const httpSource = (id: number, pathPrefix: string | null) =>
    buildSource({
      id,
      sourceKey: `web.source.${id}`,
      hostname: 'Leads.Example.test',
      pathPrefix,
    });

  const classificationError = async (promise: Promise<unknown>) => {
    try {
      await promise;
    } catch (error) {
      if (error instanceof ClassificationError) {
        return error;
      }
      throw error;
    }
    throw new Error('expected a ClassificationError');
  };

  beforeEach(async () => {
    store = new InMemoryLeadExchange();
    store.offers = [buildOffer()];
    store.sources = [buildSource(), buildSource({ id: 2, sourceKey: 'lp.retired', isActive: false })];

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ClassificationService,
        { provide: CATALOG_STORE, useValue: store },
      ],
    }).compile();

    service = module.get<ClassificationService>(ClassificationService);
  });

  describe('by source id', () => {
    it('resolves an active source to its offer, market and vertical', async () => {
      await expect(service.resolve({ sourceId: 1 })).resolves.toEqual(
        attributionFor(1),
      );
    });

    it('takes precedence over a source key', async () => {
      await expect(
        service.resolve({ sourceId: 1, sourceKey: 'lp.unknown' }),
      ).resolves.toEqual(attributionFor(1));
    });

    it('rejects an inactive source', async () => {
      const error = await classificationError(service.resolve({ sourceId: 2 }));

      expect(error.code).toBe('invalid_source');
      expect(error.httpStatus).toBe(400);
    });
  });

  describe('by source key', () => {
    it('trims the key before lookup', async () => {
      await expect(
        service.resolve({ sourceKey: '  lp.austin.plumbing ' }),
      ).resolves.toEqual(attributionFor(1));
    });

    it('rejects a key with an invalid format', async () => {
      const error = await classificationError(service.resolve({ sourceKey: '!bad' }));

      expect(error.code).toBe('invalid_source_key');
      expect(error.details).toEqual({ reason: 'format' });
    });

    it('rejects an unknown key', async () => {
      const error = await classificationError(
        service.resolve({ sourceKey: 'lp.retired' }),
      );

      expect(error.code).toBe('invalid_source_key');
      expect(error.details).toEqual({ reason: 'not_found', source_key: 'lp.retired' });
    });
  });

  describe('by HTTP host and path', () => {
    beforeEach(() => {
      store.sources.push(
        httpSource(3, '/plumbing'),
        httpSource(4, '/plumbing/austin'),
        httpSource(5, null),
      );
    });

    it('picks the longest matching path prefix', async () => {
      await expect(
        service.resolve({ host: 'leads.example.test:443', path: '/plumbing/austin/form' }),
      ).resolves.toEqual(attributionFor(4));
      await expect(
        service.resolve({ host: 'LEADS.EXAMPLE.TEST', path: '/plumbing/dallas' }),
      ).resolves.toEqual(attributionFor(3));
    });

    it('falls back to a host-wide mapping', async () => {
      await expect(
        service.resolve({ host: 'leads.example.test', path: '/hvac' }),
      ).resolves.toEqual(attributionFor(5));
    });

    it('reports an ambiguous mapping when two sources share the longest prefix', async () => {
      store.sources.push(httpSource(6, '/plumbing'));

      const error = await classificationError(
        service.resolve({ host: 'leads.example.test', path: '/plumbing/dallas' }),
      );

      expect(error.code).toBe('ambiguous_source_mapping');
      expect(error.httpStatus).toBe(409);
      expect(error.details).toEqual({
        hostname: 'leads.example.test',
        path: '/plumbing/dallas',
        candidate_source_ids: [3, 6],
        prefix_len: 9,
      });
    });

    it('rejects a request without a host', async () => {
      const error = await classificationError(service.resolve({ path: '/plumbing' }));

      expect(error.code).toBe('unmapped_source');
      expect(error.details).toEqual({ reason: 'missing_host' });
    });

    it('rejects a host with no mapping', async () => {
      const error = await classificationError(
        service.resolve({ host: 'other.example.test', path: '/' }),
      );

      expect(error.code).toBe('unmapped_source');
      expect(error.httpStatus).toBe(404);
    });
  });

  describe('canonicalization', () => {
    it('strips ports and lowercases hosts', () => {
      expect(canonicalizeHostname('Leads.Example.test:8080')).toBe('leads.example.test');
      expect(canonicalizeHostname('[::1]:8080')).toBe('[::1]');
      expect(canonicalizeHostname(undefined)).toBe('');
    });

    it('roots paths', () => {
      expect(canonicalizePath('form')).toBe('/form');
      expect(canonicalizePath('  ')).toBe('/');
      expect(canonicalizePath('/a/b')).toBe('/a/b');
    });
  });
});
