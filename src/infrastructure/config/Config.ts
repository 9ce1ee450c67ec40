import dotenv from "dotenv";
import { z } from "zod";
import type { LogLevel } from "../../domain/ports/ILogger.js";
import type { AlexaSettings } from "../alexa/AlexaEndpoints.js";
import type { SyncMode } from "../../domain/entities/GroupMembership.js";
import { normalizeAreaName } from "../../domain/entities/Identifiers.js";
import { ConfigurationError } from "../../domain/errors/SyncError.js";

// Load environment variables from .env
dotenv.config();

export interface AppConfig {
  alexa: AlexaSettings & {
    /** Only entities whose description mentions this text are deleted with --filter-entities */
    descriptionFilterText: string;
  };
  homeAssistant: {
    url: string;
    accessToken: string;
    /** Media player entity of the Echo used for discovery */
    alexaEntityId?: string;
    /** Normalized area names */
    ignoredAreas: string[];
  };
  sync: {
    mode: SyncMode;
    doNotDelete: boolean;
    /** Pause between requests, in milliseconds (0 when disabled) */
    requestDelayMs: number;
  };
  discovery: {
    timeoutMs: number;
    pollIntervalMs: number;
    stablePolls: number;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}

const REQUEST_DELAY_MS = 200;
const TRUTHY = new Set(["1", "true", "yes", "on"]);

const emptyAsUndefined = (value: unknown): unknown => (value === "" ? undefined : value);

const envString = (defaultValue: string) => z.string().trim().default(defaultValue);

const envOptionalString = z.preprocess(emptyAsUndefined, z.string().trim().optional());

const envBoolean = (defaultValue: boolean) =>
  z.preprocess(
    emptyAsUndefined,
    z
      .string()
      .trim()
      .toLowerCase()
      .optional()
      .transform((value) => (value === undefined ? defaultValue : TRUTHY.has(value)))
  );

const envPositiveInt = (defaultValue: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(defaultValue));

const envSchema = z.object({
  ALEXA_HOST: envString("na-api-alexa.amazon.ca"),
  ALEXA_COOKIE: envString(""),
  ALEXA_CSRF: envString(""),
  ALEXA_APP_HEADER: envString(""),
  ALEXA_DELETE_SKILL: envString(""),
  ALEXA_USER_AGENT: envString(
    "AppleWebKit PitanguiBridge/2.2.635412.0-[HARDWARE=iPhone17_3][SOFTWARE=18.2][DEVICE=iPhone]"
  ),
  ALEXA_ROUTINE_VERSION: envString("3.0.255246"),
  DESCRIPTION_FILTER_TEXT: envString("Home Assistant"),
  HA_URL: envString("http://homeassistant.local:8123"),
  HA_ACCESS_TOKEN: envString(""),
  ALEXA_ENTITY_ID: envOptionalString,
  IGNORED_HA_AREAS: envString(""),
  DO_NOT_DELETE: envBoolean(false),
  SHOULD_SLEEP: envBoolean(false),
  SYNC_MODE: z.preprocess(emptyAsUndefined, z.enum(["update_only", "full"]).default("update_only")),
  DISCOVERY_TIMEOUT_MS: envPositiveInt(120000),
  DISCOVERY_POLL_INTERVAL_MS: envPositiveInt(5000),
  DISCOVERY_STABLE_POLLS: envPositiveInt(3),
  LOG_LEVEL: z.preprocess(
    emptyAsUndefined,
    z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info")
  ),
  LOG_PRETTY: envBoolean(true),
});

/**
 * Comma-separated list → normalized, de-duplicated area names
 */
export function parseIgnoredAreas(raw: string): string[] {
  const names = raw
    .split(",")
    .map((name) => normalizeAreaName(name))
    .filter((name) => name.length > 0);
  return [...new Set(names)];
}

/**
 * Load configuration from the environment (and `.env`)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    alexa: {
      host: vars.ALEXA_HOST,
      cookie: vars.ALEXA_COOKIE,
      csrf: vars.ALEXA_CSRF,
      appHeader: vars.ALEXA_APP_HEADER,
      deleteSkill: vars.ALEXA_DELETE_SKILL,
      userAgent: vars.ALEXA_USER_AGENT,
      routineVersion: vars.ALEXA_ROUTINE_VERSION,
      descriptionFilterText: vars.DESCRIPTION_FILTER_TEXT,
    },
    homeAssistant: {
      url: vars.HA_URL.replace(/\/+$/, ""),
      accessToken: vars.HA_ACCESS_TOKEN,
      alexaEntityId: vars.ALEXA_ENTITY_ID,
      ignoredAreas: parseIgnoredAreas(vars.IGNORED_HA_AREAS),
    },
    sync: {
      mode: vars.SYNC_MODE,
      doNotDelete: vars.DO_NOT_DELETE,
      requestDelayMs: vars.SHOULD_SLEEP ? REQUEST_DELAY_MS : 0,
    },
    discovery: {
      timeoutMs: vars.DISCOVERY_TIMEOUT_MS,
      pollIntervalMs: vars.DISCOVERY_POLL_INTERVAL_MS,
      stablePolls: vars.DISCOVERY_STABLE_POLLS,
    },
    logging: {
      level: vars.LOG_LEVEL,
      pretty: vars.LOG_PRETTY,
    },
  };
}

/**
 * Validate configuration before anything touches the network
 */
export function validateConfig(
  config: AppConfig,
  options: { alexaOnly?: boolean; deletesAppliances?: boolean } = {}
): void {
  if (!config.alexa.host) {
    throw new ConfigurationError("ALEXA_HOST is required");
  }

  if (!config.alexa.cookie) {
    throw new ConfigurationError(
      "ALEXA_COOKIE is required. Copy the Cookie header from the Alexa app's HTTP traffic."
    );
  }

  if (options.deletesAppliances && !config.alexa.deleteSkill) {
    throw new ConfigurationError(
      "ALEXA_DELETE_SKILL is required to delete entities or endpoints. It is the skill prefix of the appliance ids."
    );
  }

  if (options.alexaOnly) {
    return;
  }

  if (!config.homeAssistant.url.startsWith("http://") && !config.homeAssistant.url.startsWith("https://")) {
    throw new ConfigurationError("HA_URL must start with http:// or https://");
  }

  if (!config.homeAssistant.accessToken) {
    throw new ConfigurationError(
      "HA_ACCESS_TOKEN is required unless --alexa-only is set. Please provide a long-lived access token."
    );
  }
}
