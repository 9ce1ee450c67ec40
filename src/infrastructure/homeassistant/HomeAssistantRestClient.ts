import type { IHomeAssistantClient } from '../../domain/ports/IHomeAssistantClient.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { isSuccessStatus, type ITransport } from '../../domain/ports/ITransport.js';
import type { HaAreaMap } from '../../domain/entities/Area.js';
import { DirectoryReadError } from '../../domain/errors/SyncError.js';
import { parseLenientJsonObject } from '../utils/lenientJson.js';

export interface HomeAssistantRestConfig {
  /** Base URL, e.g. `https://homeassistant.local:8123` */
  url: string;
  accessToken: string;
}

const REQUEST_TIMEOUT_MS = 15000;

export const AREAS_TEMPLATE =
  '{%- for area in areas() -%} {{area|to_json}}:{{area_entities(area)|to_json}}, {%- endfor -%}';

export const LAST_CALLED_TEMPLATE =
  "{{ states.media_player | selectattr('attributes.last_called', 'eq', true) | map(attribute='entity_id') | first | default('') }}";

/** Alexa Media Player accepts voice-style commands through play_media */
const DISCOVERY_COMMAND = 'discover devices';

/**
 * Home Assistant REST client (template rendering and service calls)
 */
export class HomeAssistantRestClient implements IHomeAssistantClient {
  private readonly baseUrl: string;

  constructor(
    private readonly config: HomeAssistantRestConfig,
    private readonly transport: ITransport,
    private readonly logger: ILogger
  ) {
    this.baseUrl = config.url.replace(/\/+$/, '');
  }

  async getAreas(): Promise<HaAreaMap> {
    const text = await this.renderTemplate(AREAS_TEMPLATE);

    let parsed: unknown;
    try {
      parsed = parseLenientJsonObject(text);
    } catch (error) {
      this.logger.error('Could not parse Home Assistant areas', error, {
        bodyPreview: text.slice(0, 100),
      });
      return {};
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      this.logger.error('Home Assistant areas are not an object', undefined, { bodyPreview: text.slice(0, 100) });
      return {};
    }

    const areas: HaAreaMap = {};
    for (const [name, entityIds] of Object.entries(parsed)) {
      if (!Array.isArray(entityIds)) {
        this.logger.warn('Skipping area with unexpected entity list', { area: name });
        continue;
      }
      const ids: unknown[] = entityIds;
      areas[name] = ids.filter((id): id is string => typeof id === 'string');
    }

    this.logger.debug('Loaded Home Assistant areas', { count: Object.keys(areas).length });
    return areas;
  }

  async getLastCalledDevice(): Promise<string | null> {
    const text = await this.renderTemplate(LAST_CALLED_TEMPLATE);
    const entityId = text.trim();
    return entityId.length > 0 ? entityId : null;
  }

  async triggerDiscovery(mediaPlayerEntityId: string): Promise<boolean> {
    const response = await this.transport.send({
      method: 'POST',
      url: `${this.baseUrl}/api/services/media_player/play_media`,
      headers: this.headers(),
      body: JSON.stringify({
        entity_id: mediaPlayerEntityId,
        media_content_id: DISCOVERY_COMMAND,
        media_content_type: 'custom',
      }),
      timeoutMs: REQUEST_TIMEOUT_MS,
    });

    if (!isSuccessStatus(response.statusCode)) {
      this.logger.warn('Discovery trigger was rejected', {
        entityId: mediaPlayerEntityId,
        statusCode: response.statusCode,
      });
      return false;
    }
    return true;
  }

  private async renderTemplate(template: string): Promise<string> {
    const response = await this.transport.send({
      method: 'POST',
      url: `${this.baseUrl}/api/template`,
      headers: this.headers(),
      body: JSON.stringify({ template }),
      timeoutMs: REQUEST_TIMEOUT_MS,
    });

    if (response.statusCode !== 200) {
      throw new DirectoryReadError(
        `Home Assistant template endpoint answered HTTP ${response.statusCode}`,
        response.statusCode
      );
    }
    return response.bodyText;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.config.accessToken}`,
      'Content-Type': 'application/json',
    };
  }
}
