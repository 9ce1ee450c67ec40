import type { IDirectoryWriter, MutationResult } from '../../domain/ports/IDirectoryWriter.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { CrossReference, HaAreaMap } from '../../domain/entities/Area.js';
import {
  buildCreateGroupPayload,
  buildUpdateGroupPayload,
  type ApplianceGroup,
} from '../../domain/entities/ApplianceGroup.js';
import { normalizeAreaName, prettifyAreaName } from '../../domain/entities/Identifiers.js';
import { planMembershipChange, type SyncMode } from '../../domain/entities/GroupMembership.js';
import {
  emptySummary,
  recordOutcome,
  type ReconciliationOutcome,
  type SyncSummary,
} from '../../domain/entities/SyncSummary.js';
import { runBatch, describeFailure } from '../BatchRunner.js';

export interface SyncAreasToGroupsInput {
  areas: HaAreaMap;
  groups: readonly ApplianceGroup[];
  crossReference: CrossReference;
  mode: SyncMode;
  /** Create groups for areas that have none */
  syncGroups: boolean;
  /** Reconcile membership of groups that already exist */
  syncEntities: boolean;
}

export interface SyncAreasToGroupsOptions {
  /** Normalized area names never turned into new groups */
  ignoredAreas?: readonly string[];
  /** Asked before each mutation; `false` reports the area as skipped */
  confirm?: (question: string) => Promise<boolean>;
  signal?: AbortSignal;
}

interface AreaWork {
  area: string;
  normalized: string;
  /** Appliances of this area and of every later area with the same normalized name */
  applianceIds: string[];
  /** Later areas folded into this one */
  merged: string[];
}

interface AreaUpdate extends AreaWork {
  group: ApplianceGroup;
}

/**
 * Reconcile Home Assistant areas with Alexa groups.
 *
 * Creation phase: areas with no group of the same normalized name get one, unless
 * ignored. Entity phase: areas that already have a group get their membership diffed
 * under the requested mode; the ignore list does not apply there.
 * Every area considered ends up in exactly one bucket of the summary.
 */
export class SyncAreasToGroups {
  private readonly logger: ILogger;
  private readonly ignoredAreas: ReadonlySet<string>;

  constructor(
    private readonly writer: IDirectoryWriter,
    logger: ILogger,
    private readonly options: SyncAreasToGroupsOptions = {}
  ) {
    this.logger = logger.child({ component: 'SyncAreasToGroups' });
    this.ignoredAreas = new Set((options.ignoredAreas ?? []).map(normalizeAreaName));
  }

  async execute(input: SyncAreasToGroupsInput): Promise<SyncSummary> {
    this.logger.info('Executing SyncAreasToGroups use case', {
      areas: Object.keys(input.areas).length,
      groups: input.groups.length,
      mode: input.mode,
      syncGroups: input.syncGroups,
      syncEntities: input.syncEntities,
    });

    const summary = emptySummary();
    const groupsByName = this.indexGroups(input.groups);
    const missing: AreaWork[] = [];
    const existing: AreaUpdate[] = [];
    const byName = new Map<string, AreaWork>();

    for (const area of Object.keys(input.areas)) {
      const normalized = normalizeAreaName(area);
      const applianceIds = input.crossReference.appliances[area] ?? [];

      // Areas that normalize alike share one group
      const first = byName.get(normalized);
      if (first) {
        this.logger.warn('Merging area into one with the same normalized name', { area, into: first.area });
        first.applianceIds = [...new Set([...first.applianceIds, ...applianceIds])];
        first.merged.push(area);
        continue;
      }

      const work: AreaWork = { area, normalized, applianceIds: [...new Set(applianceIds)], merged: [] };
      const group = groupsByName.get(normalized);
      if (group) {
        const update: AreaUpdate = { ...work, group };
        existing.push(update);
        byName.set(normalized, update);
      } else {
        missing.push(work);
        byName.set(normalized, work);
      }
    }

    if (input.syncGroups) {
      await this.runPhase('Creating groups', missing, summary, (work) => this.createGroup(work));
    }

    if (input.syncEntities && !summary.interrupted) {
      await this.runPhase('Syncing group members', existing, summary, (work) =>
        this.updateGroup(work, input.mode)
      );
    }

    this.logger.info('SyncAreasToGroups finished', {
      created: summary.created.length,
      updated: summary.updated.length,
      skipped: summary.skipped.length,
      errors: summary.errors.length,
      interrupted: summary.interrupted,
    });
    return summary;
  }

  private async runPhase<W extends AreaWork>(
    label: string,
    work: readonly W[],
    summary: SyncSummary,
    handler: (work: W) => Promise<{ outcome: ReconciliationOutcome; detail?: string }>
  ): Promise<void> {
    const result = await runBatch(
      work,
      label,
      async (item) => {
        const { outcome, detail } = await handler(item);
        recordOutcome(summary, item.area, outcome, detail);
        recordMerged(summary, item);
      },
      { logger: this.logger, signal: this.options.signal, describe: (item) => item.area }
    );

    for (const failure of result.failures) {
      recordOutcome(summary, failure.item.area, 'error', describeFailure(failure));
      recordMerged(summary, failure.item);
    }
    if (result.interrupted) {
      summary.interrupted = true;
    }
  }

  private async createGroup(work: AreaWork): Promise<{ outcome: ReconciliationOutcome; detail?: string }> {
    if (this.ignoredAreas.has(work.normalized)) {
      this.logger.debug('Area is on the ignore list, not creating a group', { area: work.area });
      return { outcome: 'skipped' };
    }

    const name = prettifyAreaName(work.normalized);
    const applianceIds = work.applianceIds;

    if (!(await this.confirmed(`Create group "${name}" with ${applianceIds.length} devices?`))) {
      return { outcome: 'skipped' };
    }

    const result = await this.writer.createGroup(buildCreateGroupPayload(name, applianceIds));
    return toOutcome(result, 'created');
  }

  private async updateGroup(
    work: AreaUpdate,
    mode: SyncMode
  ): Promise<{ outcome: ReconciliationOutcome; detail?: string }> {
    const change = planMembershipChange(work.group.applianceIds, work.applianceIds, mode);

    if (change.action === 'skip') {
      this.logger.debug('Group already in sync', { area: work.area, group: work.group.name });
      return { outcome: 'skipped' };
    }

    this.logger.info('Group membership differs', {
      group: work.group.name,
      added: change.added,
      removed: change.removed,
    });

    const question =
      `Update group "${work.group.name}" ` +
      `(+${change.added.length} / -${change.removed.length} devices)?`;
    if (!(await this.confirmed(question))) {
      return { outcome: 'skipped' };
    }

    const result = await this.writer.updateGroup(buildUpdateGroupPayload(work.group, change.members));
    return toOutcome(result, 'updated');
  }

  private async confirmed(question: string): Promise<boolean> {
    if (!this.options.confirm) return true;
    const accepted = await this.options.confirm(question);
    if (!accepted) {
      this.logger.info('Declined by user', { question });
    }
    return accepted;
  }

  /**
   * First group wins when two share a normalized name
   */
  private indexGroups(groups: readonly ApplianceGroup[]): Map<string, ApplianceGroup> {
    const index = new Map<string, ApplianceGroup>();
    for (const group of groups) {
      const key = normalizeAreaName(group.name);
      if (!index.has(key)) {
        index.set(key, group);
      }
    }
    return index;
  }
}

/**
 * Merged areas were handled through the area they were folded into
 */
function recordMerged(summary: SyncSummary, work: AreaWork): void {
  for (const area of work.merged) {
    recordOutcome(summary, area, 'skipped');
  }
}

function toOutcome(
  result: MutationResult,
  success: ReconciliationOutcome
): { outcome: ReconciliationOutcome; detail?: string } {
  return result.ok ? { outcome: success } : { outcome: 'error', detail: result.error.message };
}
