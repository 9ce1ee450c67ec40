import type { IAlexaDirectory } from '../../domain/ports/IAlexaDirectory.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import {
  isSuccessStatus,
  type ITransport,
  type TransportRequest,
} from '../../domain/ports/ITransport.js';
import type { AlexaEntity } from '../../domain/entities/AlexaEntity.js';
import type { ApplianceGroup } from '../../domain/entities/ApplianceGroup.js';
import { DirectoryReadError } from '../../domain/errors/SyncError.js';
import { AlexaResponseMapper, type Mapped } from '../mappers/AlexaResponseMapper.js';
import type { AlexaEndpoints } from './AlexaEndpoints.js';

const LIST_TIMEOUT_MS = 15000;

export const ENDPOINTS_QUERY = `
  query CustomerSmartHome {
    endpoints(endpointsQueryParams: { paginationParams: { disablePagination: true } }) {
      items {
        friendlyName
        legacyAppliance {
          applianceId
          mergedApplianceIds
          connectedVia
          applianceKey
          appliancePairs
          modelName
          friendlyDescription
          version
          friendlyName
          manufacturerName
        }
      }
    }
  }
`;

/**
 * Reads the Alexa smart home directory
 */
export class AlexaDirectoryClient implements IAlexaDirectory {
  constructor(
    private readonly transport: ITransport,
    private readonly endpoints: AlexaEndpoints,
    private readonly logger: ILogger
  ) {}

  async listEntities(): Promise<AlexaEntity[]> {
    const body = await this.fetchJson('entities', {
      method: 'GET',
      url: this.endpoints.entitiesUrl(),
      headers: this.endpoints.headers(),
      timeoutMs: LIST_TIMEOUT_MS,
    });
    return this.unwrap('entities', body, AlexaResponseMapper.mapEntities);
  }

  async listEndpoints(): Promise<AlexaEntity[]> {
    const body = await this.fetchJson('endpoints', {
      method: 'POST',
      url: this.endpoints.graphqlUrl(),
      headers: this.endpoints.headers(),
      body: JSON.stringify({ query: ENDPOINTS_QUERY }),
      timeoutMs: LIST_TIMEOUT_MS,
    });
    return this.unwrap('endpoints', body, AlexaResponseMapper.mapEndpoints);
  }

  async listGroups(): Promise<ApplianceGroup[]> {
    const body = await this.fetchJson('groups', {
      method: 'GET',
      url: this.endpoints.groupsUrl(),
      headers: this.endpoints.headers(),
      timeoutMs: LIST_TIMEOUT_MS,
    });
    return this.unwrap('groups', body, AlexaResponseMapper.mapGroups);
  }

  /**
   * Resolves with the decoded body, or `undefined` when it is empty or not JSON
   */
  private async fetchJson(listing: string, request: TransportRequest): Promise<unknown> {
    const response = await this.transport.send(request);

    if (!isSuccessStatus(response.statusCode)) {
      throw new DirectoryReadError(
        `Alexa ${listing} listing answered HTTP ${response.statusCode}`,
        response.statusCode
      );
    }

    if (!response.bodyText.trim()) {
      this.logger.warn('Empty response from Alexa listing', { listing });
      return undefined;
    }

    try {
      const decoded: unknown = JSON.parse(response.bodyText);
      return decoded;
    } catch (error) {
      this.logger.error('Could not decode Alexa listing', error, {
        listing,
        bodyPreview: response.bodyText.slice(0, 100),
      });
      return undefined;
    }
  }

  private unwrap<T>(listing: string, body: unknown, map: (raw: unknown) => Mapped<T> | null): T[] {
    if (body === undefined) return [];

    const mapped = map(body);
    if (!mapped) {
      this.logger.error('Unexpected shape in Alexa listing', undefined, { listing });
      return [];
    }

    for (const skipped of mapped.skipped) {
      this.logger.warn('Skipping listing item', { listing, reason: skipped.reason, item: skipped.item });
    }

    this.logger.debug('Loaded Alexa listing', { listing, count: mapped.items.length });
    return mapped.items;
  }
}
