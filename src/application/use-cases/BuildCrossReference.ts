import type { IAlexaDirectory } from '../../domain/ports/IAlexaDirectory.js';
import type { IHomeAssistantClient } from '../../domain/ports/IHomeAssistantClient.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { AlexaEntity } from '../../domain/entities/AlexaEntity.js';
import type { CrossReference, HaAreaMap } from '../../domain/entities/Area.js';
import { AreaMapper } from '../../infrastructure/mappers/AreaMapper.js';

export interface BuildCrossReferenceOutput {
  areas: HaAreaMap;
  endpoints: AlexaEntity[];
  crossReference: CrossReference;
}

/**
 * Use case for matching Home Assistant areas against the Alexa endpoint listing
 */
export class BuildCrossReference {
  private readonly logger: ILogger;

  constructor(
    private readonly haClient: IHomeAssistantClient,
    private readonly directory: IAlexaDirectory,
    logger: ILogger
  ) {
    this.logger = logger.child({ component: 'BuildCrossReference' });
  }

  async execute(): Promise<BuildCrossReferenceOutput> {
    const areas = await this.haClient.getAreas();
    const endpoints = await this.directory.listEndpoints();
    const crossReference = AreaMapper.matchAreasToAppliances(areas, endpoints);

    const unmatchedCount = Object.values(crossReference.unmatched).reduce((sum, ids) => sum + ids.length, 0);
    if (unmatchedCount > 0) {
      this.logger.info('Some Home Assistant entities have no Alexa appliance', {
        unmatched: unmatchedCount,
        areas: Object.keys(crossReference.unmatched).length,
      });
    }

    this.logger.debug('Cross reference built', {
      areas: Object.keys(areas).length,
      endpoints: endpoints.length,
    });
    return { areas, endpoints, crossReference };
  }
}
