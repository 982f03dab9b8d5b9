import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  Attribution,
  CATALOG_STORE,
  CatalogStore,
  HttpSourceMapping,
} from '../catalog/interfaces/catalog-store.interface';
import { ClassificationError } from './classification.error';

export interface ClassificationInput {
  sourceId?: number | null;
  sourceKey?: string | null;
  host?: string | null;
  path?: string | null;
}

const SOURCE_KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._:-]{1,127}$/;

export function canonicalizeSourceKey(sourceKey: string): string {
  const key = sourceKey.trim();
  if (!SOURCE_KEY_PATTERN.test(key)) {
    throw new ClassificationError(
      'invalid_source_key',
      'source_key has an invalid format',
      { reason: 'format' },
    );
  }
  return key;
}

/** Lowercases and strips any port; returns '' for a missing host */
export function canonicalizeHostname(host: string | null | undefined): string {
  const value = (host ?? '').trim().toLowerCase();
  if (value.startsWith('[')) {
    // bracketed IPv6 literal, e.g. [::1]:8080
    const end = value.indexOf(']');
    return end === -1 ? value : value.slice(0, end + 1);
  }
  const colon = value.indexOf(':');
  return colon === -1 ? value : value.slice(0, colon);
}

export function canonicalizePath(path: string | null | undefined): string {
  const value = (path ?? '').trim();
  if (!value) {
    return '/';
  }
  return value.startsWith('/') ? value : `/${value}`;
}

/**
 * Maps an inbound submission to its (source, offer, market, vertical).
 * Inputs are tried in order source id, source key, HTTP host/path; the first
 * one present decides, the others are ignored.
 */
@Injectable()
export class ClassificationService {
  private readonly logger = new Logger(ClassificationService.name);

  constructor(
    @Inject(CATALOG_STORE)
    private readonly catalog: CatalogStore,
  ) {}

  async resolve(input: ClassificationInput): Promise<Attribution> {
    if (input.sourceId !== undefined && input.sourceId !== null) {
      return this.resolveById(input.sourceId);
    }
    if (input.sourceKey !== undefined && input.sourceKey !== null) {
      return this.resolveByKey(input.sourceKey);
    }
    return this.resolveByHttp(input.host, input.path);
  }

  private async resolveById(sourceId: number): Promise<Attribution> {
    const attribution = Number.isInteger(sourceId)
      ? await this.catalog.findActiveSourceById(sourceId)
      : null;
    if (!attribution) {
      throw new ClassificationError(
        'invalid_source',
        `Source ${sourceId} does not exist or is inactive`,
        { source_id: sourceId },
      );
    }
    return attribution;
  }

  private async resolveByKey(rawKey: string): Promise<Attribution> {
    const sourceKey = canonicalizeSourceKey(rawKey);
    const attribution = await this.catalog.findActiveSourceByKey(sourceKey);
    if (!attribution) {
      throw new ClassificationError(
        'invalid_source_key',
        `No active source for key ${sourceKey}`,
        { reason: 'not_found', source_key: sourceKey },
      );
    }
    return attribution;
  }

  private async resolveByHttp(
    host: string | null | undefined,
    path: string | null | undefined,
  ): Promise<Attribution> {
    const hostname = canonicalizeHostname(host);
    if (!hostname) {
      throw new ClassificationError(
        'unmapped_source',
        'Request carries no source and no host to map',
        { reason: 'missing_host' },
      );
    }
    const requestPath = canonicalizePath(path);

    const mappings =
      await this.catalog.findActiveSourcesByHostname(hostname);
    const ranked = rankHttpMappings(mappings, requestPath);

    if (ranked.length === 0) {
      throw new ClassificationError(
        'unmapped_source',
        `No source mapped for ${hostname}${requestPath}`,
        { hostname, path: requestPath },
      );
    }

    const [best, runnerUp] = ranked;
    if (runnerUp && runnerUp.prefixLength === best.prefixLength) {
      this.logger.warn(
        `Ambiguous mapping for ${hostname}${requestPath}: sources ${best.mapping.sourceId} and ${runnerUp.mapping.sourceId}`,
      );
      throw new ClassificationError(
        'ambiguous_source_mapping',
        `Multiple sources share the longest prefix for ${hostname}${requestPath}`,
        {
          hostname,
          path: requestPath,
          candidate_source_ids: [
            best.mapping.sourceId,
            runnerUp.mapping.sourceId,
          ],
          prefix_len: best.prefixLength,
        },
      );
    }

    const { sourceId, offerId, marketId, verticalId } = best.mapping;
    return { sourceId, offerId, marketId, verticalId };
  }
}

interface RankedMapping {
  mapping: HttpSourceMapping;
  prefixLength: number;
}

/** Longest matching prefix first, then lowest source id */
export function rankHttpMappings(
  mappings: HttpSourceMapping[],
  requestPath: string,
): RankedMapping[] {
  return mappings
    .filter(
      (mapping) =>
        mapping.pathPrefix === null || requestPath.startsWith(mapping.pathPrefix),
    )
    .map((mapping) => ({
      mapping,
      prefixLength: mapping.pathPrefix?.length ?? 0,
    }))
    .sort(
      (a, b) =>
        b.prefixLength - a.prefixLength ||
        a.mapping.sourceId - b.mapping.sourceId,
    );
}
