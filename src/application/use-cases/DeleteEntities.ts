import type { IAlexaDirectory } from '../../domain/ports/IAlexaDirectory.js';
import type { IDirectoryWriter } from '../../domain/ports/IDirectoryWriter.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { matchesDescriptionFilter, type AlexaEntity } from '../../domain/entities/AlexaEntity.js';
import type { SyncError } from '../../domain/entities/SyncSummary.js';
import { runBatch, describeFailure } from '../BatchRunner.js';

export interface DeleteEntitiesInput {
  /** `entities` uses the behaviors listing, `endpoints` the GraphQL one */
  source: 'entities' | 'endpoints';
  /** Only delete entities whose description or manufacturer contains this text */
  filterText?: string;
}

export interface DeletionReport {
  deleted: string[];
  skipped: string[];
  errors: SyncError[];
  interrupted: boolean;
}

export interface DeletionOptions {
  confirm?: (question: string) => Promise<boolean>;
  signal?: AbortSignal;
}

/**
 * Use case for removing entities from the Alexa directory, one at a time
 */
export class DeleteEntities {
  private readonly logger: ILogger;

  constructor(
    private readonly directory: IAlexaDirectory,
    private readonly writer: IDirectoryWriter,
    logger: ILogger,
    private readonly options: DeletionOptions = {}
  ) {
    this.logger = logger.child({ component: 'DeleteEntities' });
  }

  async execute(input: DeleteEntitiesInput): Promise<DeletionReport> {
    const listed =
      input.source === 'entities' ? await this.directory.listEntities() : await this.directory.listEndpoints();
    const filterText = input.filterText;
    const targets = filterText ? listed.filter((entity) => matchesDescriptionFilter(entity, filterText)) : listed;

    this.logger.info('Executing DeleteEntities use case', {
      source: input.source,
      listed: listed.length,
      targets: targets.length,
      filterText,
    });

    const report: DeletionReport = { deleted: [], skipped: [], errors: [], interrupted: false };

    const result = await runBatch(
      targets,
      'Deleting entities',
      async (entity: AlexaEntity) => {
        if (this.options.confirm && !(await this.options.confirm(`Delete "${entity.displayName}"?`))) {
          report.skipped.push(entity.displayName);
          return;
        }

        const outcome = await this.writer.deleteEntity(entity);
        if (outcome.ok) {
          report.deleted.push(entity.displayName);
        } else {
          report.errors.push({ name: entity.displayName, detail: outcome.error.message });
        }
      },
      { logger: this.logger, signal: this.options.signal, describe: (entity) => entity.displayName }
    );

    for (const failure of result.failures) {
      report.errors.push({ name: failure.item.displayName, detail: describeFailure(failure) });
    }
    report.interrupted = result.interrupted;
    return report;
  }
}
