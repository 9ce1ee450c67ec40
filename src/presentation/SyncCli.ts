import type { IAlexaDirectory } from "../domain/ports/IAlexaDirectory.js";
import type { IDirectoryWriter } from "../domain/ports/IDirectoryWriter.js";
import type { IHomeAssistantClient } from "../domain/ports/IHomeAssistantClient.js";
import type { IClock } from "../domain/ports/IClock.js";
import type { ILogger } from "../domain/ports/ILogger.js";
import type { RunContext } from "../domain/entities/RunContext.js";
import type { SyncMode } from "../domain/entities/GroupMembership.js";
import type { SyncSummary } from "../domain/entities/SyncSummary.js";
import {
  BuildCrossReference,
  DeleteEntities,
  DeleteGroups,
  SyncAreasToGroups,
  WaitForDeviceDiscovery,
  type DeletionReport,
  type DiscoveryResult,
  type DiscoverySettings,
} from "../application/index.js";
import { AreaMapper } from "../infrastructure/mappers/AreaMapper.js";
import { normalizeHaEntityId } from "../domain/entities/Identifiers.js";
import { HOME_ASSISTANT_ACTIONS, USAGE, type CliAction, type CliOptions } from "./CliArgs.js";
import { renderTable } from "./TableRenderer.js";

export interface SyncCliSettings {
  mode: SyncMode;
  /** Normalized area names never turned into groups */
  ignoredAreas: string[];
  descriptionFilterText: string;
  discovery: DiscoverySettings;
}

export interface SyncCliDependencies {
  directory: IAlexaDirectory;
  writer: IDirectoryWriter;
  haClient: IHomeAssistantClient;
  clock: IClock;
  context: RunContext;
  settings: SyncCliSettings;
  /** Where tables and summaries go */
  output: (text: string) => void;
  /** Set for --interactive */
  confirm?: (question: string) => Promise<boolean>;
  signal?: AbortSignal;
}

/**
 * Runs the actions selected on the command line, in a fixed order
 */
export class SyncCli {
  private readonly logger: ILogger;

  constructor(
    private readonly deps: SyncCliDependencies,
    logger: ILogger
  ) {
    this.logger = logger.child({ component: "SyncCli" });
  }

  /**
   * Resolves with the process exit code
   */
  async run(options: CliOptions): Promise<number> {
    if (options.help || options.actions.length === 0) {
      this.deps.output(USAGE);
      return 0;
    }

    if (this.deps.context.dryRun) {
      this.logger.info("Dry run: no changes will be sent");
    }

    for (const action of options.actions) {
      if (this.deps.signal?.aborted) {
        this.logger.warn("Interrupted, skipping remaining actions", { next: action });
        break;
      }

      if (options.alexaOnly && HOME_ASSISTANT_ACTIONS.has(action)) {
        this.logger.info("Alexa-only mode: skipping action that needs Home Assistant", { action });
        continue;
      }

      await this.runAction(action, options);
    }

    return 0;
  }

  private async runAction(action: CliAction, options: CliOptions): Promise<void> {
    const mode = options.mode ?? this.deps.settings.mode;

    switch (action) {
      case "get-entities":
        return this.printEntities("Alexa entities", await this.deps.directory.listEntities());
      case "get-endpoints":
        return this.printEntities("Alexa endpoints", await this.deps.directory.listEndpoints());
      case "get-groups":
        return this.printGroups();
      case "get-ha-areas":
        return this.printAreas();
      case "get-ha-mapping":
        return this.printMapping();
      case "delete-entities":
      case "delete-endpoints":
        return this.deleteEntities(action === "delete-entities" ? "entities" : "endpoints", options);
      case "delete-groups":
        return this.printDeletion("Groups", await this.useDeleteGroups().execute());
      case "discover-devices":
        this.printDiscovery(await this.discover());
        return;
      case "create-groups":
        return this.sync({ mode, syncGroups: true, syncEntities: false });
      case "sync-entities":
        return this.sync({ mode, syncGroups: false, syncEntities: true });
      case "full-sync":
        return this.fullSync();
    }
  }

  private async fullSync(): Promise<void> {
    const discovery = await this.discover();
    this.printDiscovery(discovery);
    if (discovery.status === "interrupted") {
      return;
    }
    if (discovery.status !== "converged") {
      this.logger.warn("Continuing without converged discovery; new devices may be missing from groups");
    }
    await this.sync({ mode: "full", syncGroups: true, syncEntities: true });
  }

  private async sync(request: { mode: SyncMode; syncGroups: boolean; syncEntities: boolean }): Promise<void> {
    const { areas, crossReference } = await new BuildCrossReference(
      this.deps.haClient,
      this.deps.directory,
      this.logger
    ).execute();
    const groups = await this.deps.directory.listGroups();

    const summary = await new SyncAreasToGroups(this.deps.writer, this.logger, {
      ignoredAreas: this.deps.settings.ignoredAreas,
      confirm: this.deps.confirm,
      signal: this.deps.signal,
    }).execute({ areas, groups, crossReference, ...request });

    this.printSummary(summary);
  }

  private async deleteEntities(source: "entities" | "endpoints", options: CliOptions): Promise<void> {
    const report = await new DeleteEntities(this.deps.directory, this.deps.writer, this.logger, {
      confirm: this.deps.confirm,
      signal: this.deps.signal,
    }).execute({
      source,
      filterText: options.filterEntities ? this.deps.settings.descriptionFilterText : undefined,
    });
    this.printDeletion(source === "entities" ? "Entities" : "Endpoints", report);
  }

  private useDeleteGroups(): DeleteGroups {
    return new DeleteGroups(this.deps.directory, this.deps.writer, this.logger, {
      confirm: this.deps.confirm,
      signal: this.deps.signal,
    });
  }

  private discover(): Promise<DiscoveryResult> {
    return new WaitForDeviceDiscovery(
      this.deps.directory,
      this.deps.haClient,
      this.deps.clock,
      this.deps.context,
      this.logger,
      this.deps.settings.discovery,
      this.deps.signal
    ).execute();
  }

  private printEntities(title: string, entities: { displayName: string; id: string; description: string }[]): void {
    this.deps.output(
      renderTable(
        title,
        ["Name", "Id", "Description"],
        entities.map((entity) => [entity.displayName, entity.id, entity.description])
      )
    );
  }

  private async printGroups(): Promise<void> {
    const groups = await this.deps.directory.listGroups();
    this.deps.output(
      renderTable(
        "Alexa groups",
        ["Name", "Group id", "Appliances"],
        groups.map((group) => [group.name, group.id, String(group.applianceIds.length)])
      )
    );
  }

  private async printAreas(): Promise<void> {
    const areas = await this.deps.haClient.getAreas();
    const rows = Object.entries(areas).flatMap(([area, entityIds]) =>
      entityIds.length > 0 ? entityIds.map((entityId) => [area, entityId]) : [[area, ""]]
    );
    this.deps.output(renderTable("Home Assistant areas", ["Area", "Entity id"], rows));
  }

  private async printMapping(): Promise<void> {
    const { areas, endpoints, crossReference } = await new BuildCrossReference(
      this.deps.haClient,
      this.deps.directory,
      this.logger
    ).execute();
    const index = AreaMapper.indexAppliances(endpoints);

    const rows = Object.entries(areas).flatMap(([area, entityIds]) =>
      entityIds.map((entityId) => [area, entityId, index.get(normalizeHaEntityId(entityId)) ?? "(no match)"])
    );
    this.deps.output(
      renderTable("Home Assistant entity to Alexa appliance mapping", ["Area", "HA entity id", "Alexa appliance id"], rows)
    );

    const unmatched = Object.values(crossReference.unmatched).reduce((sum, ids) => sum + ids.length, 0);
    this.deps.output(`${unmatched} Home Assistant entities have no Alexa appliance`);
  }

  private printSummary(summary: SyncSummary): void {
    const lines = [
      `Created: ${summary.created.length}${list(summary.created)}`,
      `Updated: ${summary.updated.length}${list(summary.updated)}`,
      `Skipped: ${summary.skipped.length}${list(summary.skipped)}`,
      `Errors: ${summary.errors.length}`,
      ...summary.errors.map((error) => `  ${error.name}: ${error.detail}`),
    ];
    if (summary.interrupted) {
      lines.push("Interrupted: partial results above");
    }
    this.deps.output(lines.join("\n"));
  }

  private printDeletion(title: string, report: DeletionReport): void {
    const lines = [
      `${title} deleted: ${report.deleted.length}`,
      `${title} skipped: ${report.skipped.length}`,
      `${title} failed: ${report.errors.length}`,
      ...report.errors.map((error) => `  ${error.name}: ${error.detail}`),
    ];
    if (report.interrupted) {
      lines.push("Interrupted: partial results above");
    }
    this.deps.output(lines.join("\n"));
  }

  private printDiscovery(result: DiscoveryResult): void {
    switch (result.status) {
      case "converged":
        this.deps.output(
          result.simulated
            ? "Discovery: skipped (dry run)"
            : `Discovery: converged at ${result.finalCount} entities (was ${result.initialCount}, ${result.polls} polls)`
        );
        return;
      case "timed-out":
        this.deps.output(
          `Discovery: timed out after ${result.polls} polls (${result.initialCount} → ${result.lastCount} entities)`
        );
        return;
      case "interrupted":
        this.deps.output(
          `Discovery: interrupted after ${result.polls} polls (${result.initialCount} → ${result.lastCount} entities)`
        );
        return;
      case "failed":
        this.deps.output(`Discovery: failed (${result.reason})`);
        return;
    }
  }
}

function list(names: readonly string[]): string {
  return names.length > 0 ? ` (${names.join(", ")})` : "";
}
