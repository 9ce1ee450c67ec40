import { parseArgs, type ParseArgsConfig } from "util";
import { SYNC_MODES, type SyncMode } from "../domain/entities/GroupMembership.js";
import { ConfigurationError } from "../domain/errors/SyncError.js";

/**
 * Actions in the order they run when several are given
 */
export const CLI_ACTIONS = [
  "get-entities",
  "get-endpoints",
  "get-groups",
  "get-ha-areas",
  "get-ha-mapping",
  "delete-entities",
  "delete-endpoints",
  "delete-groups",
  "discover-devices",
  "create-groups",
  "sync-entities",
  "full-sync",
] as const;

export type CliAction = (typeof CLI_ACTIONS)[number];

/** Actions that need Home Assistant; skipped under --alexa-only */
export const HOME_ASSISTANT_ACTIONS: ReadonlySet<CliAction> = new Set<CliAction>([
  "get-ha-areas",
  "get-ha-mapping",
  "discover-devices",
  "create-groups",
  "sync-entities",
  "full-sync",
]);

/** Actions that delete appliances and so need the delete skill id */
export const APPLIANCE_DELETE_ACTIONS: ReadonlySet<CliAction> = new Set<CliAction>([
  "delete-entities",
  "delete-endpoints",
]);

export interface CliOptions {
  actions: CliAction[];
  /** Overrides SYNC_MODE */
  mode?: SyncMode;
  dryRun: boolean;
  interactive: boolean;
  alexaOnly: boolean;
  filterEntities: boolean;
  help: boolean;
}

export const USAGE = `Usage: ha-alexa-sync [actions] [options]

Read-only actions:
  --get-entities        List Alexa smart home entities
  --get-endpoints       List Alexa endpoints (GraphQL listing)
  --get-groups          List Alexa appliance groups
  --get-ha-areas        List Home Assistant areas and their entities
  --get-ha-mapping      Show Home Assistant entity to Alexa appliance matches

Actions that change things:
  --delete-entities     Delete Alexa entities
  --delete-endpoints    Delete Alexa endpoints
  --delete-groups       Delete every Alexa group
  --discover-devices    Ask an Echo to discover devices and wait until the count settles
  --create-groups       Create an Alexa group for each Home Assistant area without one
  --sync-entities       Sync area members into existing Alexa groups
  --full-sync           Discover, create missing groups and sync members in full mode

Options:
  --mode <mode>         update_only (default) or full
  --dry-run             Log changes without sending them
  --interactive         Ask before each change
  --alexa-only          Skip everything that needs Home Assistant
  --filter-entities     Only delete entities whose description contains DESCRIPTION_FILTER_TEXT
  --help                Show this help
`;

function isSyncMode(value: string): value is SyncMode {
  return SYNC_MODES.some((mode) => mode === value);
}

const CLI_OPTIONS = {
  "get-entities": { type: "boolean", default: false },
  "get-endpoints": { type: "boolean", default: false },
  "get-groups": { type: "boolean", default: false },
  "get-ha-areas": { type: "boolean", default: false },
  "get-ha-mapping": { type: "boolean", default: false },
  "delete-entities": { type: "boolean", default: false },
  "delete-endpoints": { type: "boolean", default: false },
  "delete-groups": { type: "boolean", default: false },
  "discover-devices": { type: "boolean", default: false },
  "create-groups": { type: "boolean", default: false },
  "sync-entities": { type: "boolean", default: false },
  "full-sync": { type: "boolean", default: false },
  mode: { type: "string" },
  "dry-run": { type: "boolean", default: false },
  interactive: { type: "boolean", default: false },
  "alexa-only": { type: "boolean", default: false },
  "filter-entities": { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
} satisfies Record<CliAction, { type: "boolean"; default: boolean }> & NonNullable<ParseArgsConfig["options"]>;

/**
 * Parse command line flags (without the node and script arguments)
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let values: ReturnType<typeof parse>["values"];
  try {
    values = parse(argv).values;
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }

  const actions = CLI_ACTIONS.filter((action) => values[action] === true);

  let mode: SyncMode | undefined;
  if (values.mode !== undefined) {
    if (!isSyncMode(values.mode)) {
      throw new ConfigurationError(`--mode must be one of ${SYNC_MODES.join(", ")} (got "${values.mode}")`);
    }
    mode = values.mode;
  }

  return {
    actions,
    mode,
    dryRun: values["dry-run"] === true,
    interactive: values.interactive === true,
    alexaOnly: values["alexa-only"] === true,
    filterEntities: values["filter-entities"] === true,
    help: values.help === true,
  };
}

function parse(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options: CLI_OPTIONS, strict: true, allowPositionals: false });
}
