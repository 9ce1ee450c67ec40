#!/usr/bin/env node
import { loadConfig, validateConfig } from "./infrastructure/config/Config.js";
import { PinoLogger } from "./infrastructure/logging/PinoLogger.js";
import { SystemClock } from "./infrastructure/clock/SystemClock.js";
import { FetchTransport, PacedTransport } from "./infrastructure/http/FetchTransport.js";
import { AlexaEndpoints } from "./infrastructure/alexa/AlexaEndpoints.js";
import { AlexaDirectoryClient } from "./infrastructure/alexa/AlexaDirectoryClient.js";
import { AlexaDirectoryWriter } from "./infrastructure/alexa/AlexaDirectoryWriter.js";
import { HomeAssistantRestClient } from "./infrastructure/homeassistant/HomeAssistantRestClient.js";
import { MutationExecutor } from "./application/index.js";
import { ConfigurationError, type RunContext } from "./domain/index.js";
import { APPLIANCE_DELETE_ACTIONS, parseCliArgs } from "./presentation/CliArgs.js";
import { SyncCli } from "./presentation/SyncCli.js";
import { confirmOnTerminal } from "./presentation/prompt.js";

/**
 * Main entry point for ha-alexa-sync. Resolves with the exit code.
 */
async function main(argv: string[]): Promise<number> {
  // Both of these throw ConfigurationError before anything touches the network
  const options = parseCliArgs(argv);
  const config = loadConfig();
  if (!options.help && options.actions.length > 0) {
    validateConfig(config, {
      alexaOnly: options.alexaOnly,
      deletesAppliances: options.actions.some((action) => APPLIANCE_DELETE_ACTIONS.has(action)),
    });
  }

  const logger = new PinoLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
  });

  const context: RunContext = {
    dryRun: options.dryRun,
    doNotDelete: config.sync.doNotDelete,
  };

  const clock = new SystemClock();
  const transport = new PacedTransport(
    new FetchTransport(logger.child({ component: "FetchTransport" })),
    (ms) => clock.sleep(ms),
    config.sync.requestDelayMs
  );

  const endpoints = new AlexaEndpoints(config.alexa);
  const directory = new AlexaDirectoryClient(
    transport,
    endpoints,
    logger.child({ component: "AlexaDirectoryClient" })
  );
  const executor = new MutationExecutor(transport, clock, context, logger);
  const writer = new AlexaDirectoryWriter(endpoints, executor);
  const haClient = new HomeAssistantRestClient(
    { url: config.homeAssistant.url, accessToken: config.homeAssistant.accessToken },
    transport,
    logger.child({ component: "HomeAssistantRestClient" })
  );

  // The first Ctrl+C lets the item in flight finish; a second one exits.
  // At an interactive prompt Ctrl+C arrives through readline and aborts the same controller.
  const controller = new AbortController();
  controller.signal.addEventListener(
    "abort",
    () => {
      logger.warn("Interrupt received, stopping after the current item (press Ctrl+C again to quit)");
      process.once("SIGINT", () => process.exit(130));
    },
    { once: true }
  );
  process.once("SIGINT", () => controller.abort());

  const cli = new SyncCli(
    {
      directory,
      writer,
      haClient,
      clock,
      context,
      settings: {
        mode: config.sync.mode,
        ignoredAreas: config.homeAssistant.ignoredAreas,
        descriptionFilterText: config.alexa.descriptionFilterText,
        discovery: {
          timeoutMs: config.discovery.timeoutMs,
          pollIntervalMs: config.discovery.pollIntervalMs,
          stablePolls: config.discovery.stablePolls,
          mediaPlayerEntityId: config.homeAssistant.alexaEntityId,
        },
      },
      output: (text) => process.stdout.write(`${text}\n`),
      confirm: options.interactive ? (question) => confirmOnTerminal(question, controller) : undefined,
      signal: controller.signal,
    },
    logger
  );

  try {
    return await cli.run(options);
  } catch (error) {
    logger.fatal("Sync run failed", error);
    return 1;
  }
}

// Run the main function
main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
    } else {
      console.error("Unhandled error:", error);
    }
    process.exitCode = 1;
  }
);
