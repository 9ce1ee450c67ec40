import type { IAlexaDirectory } from '../../domain/ports/IAlexaDirectory.js';
import type { IDirectoryWriter } from '../../domain/ports/IDirectoryWriter.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { ApplianceGroup } from '../../domain/entities/ApplianceGroup.js';
import { runBatch, describeFailure } from '../BatchRunner.js';
import type { DeletionOptions, DeletionReport } from './DeleteEntities.js';

/**
 * Use case for removing every appliance group
 */
export class DeleteGroups {
  private readonly logger: ILogger;

  constructor(
    private readonly directory: IAlexaDirectory,
    private readonly writer: IDirectoryWriter,
    logger: ILogger,
    private readonly options: DeletionOptions = {}
  ) {
    this.logger = logger.child({ component: 'DeleteGroups' });
  }

  async execute(): Promise<DeletionReport> {
    const groups = await this.directory.listGroups();
    this.logger.info('Executing DeleteGroups use case', { groups: groups.length });

    const report: DeletionReport = { deleted: [], skipped: [], errors: [], interrupted: false };

    const result = await runBatch(
      groups,
      'Deleting groups',
      async (group: ApplianceGroup) => {
        if (this.options.confirm && !(await this.options.confirm(`Delete group "${group.name}"?`))) {
          report.skipped.push(group.name);
          return;
        }

        const outcome = await this.writer.deleteGroup(group);
        if (outcome.ok) {
          report.deleted.push(group.name);
        } else {
          report.errors.push({ name: group.name, detail: outcome.error.message });
        }
      },
      { logger: this.logger, signal: this.options.signal, describe: (group) => group.name }
    );

    for (const failure of result.failures) {
      report.errors.push({ name: failure.item.name, detail: describeFailure(failure) });
    }
    report.interrupted = result.interrupted;
    return report;
  }
}
