#!/usr/bin/env node
import { loadDiscoveryConfig } from "./infrastructure/config/Config.js";
import { createConnection, createLogger } from "./infrastructure/discovery/fromEnvironment.js";
import { DiscoverHomeAssistant } from "./application/use-cases/DiscoverHomeAssistant.js";

/**
 * Run one discovery pass and print the result as JSON on stdout
 */
async function main(): Promise<void> {
  const config = loadDiscoveryConfig();
  const logger = createLogger(config);

  logger.info("Home Assistant discovery starting", {
    mode: config.isAddon ? "Home Assistant Add-on" : "Standalone",
    url: config.homeAssistant.restUrl,
    hasToken: !!config.homeAssistant.token,
  });

  const connection = createConnection(config, logger);
  const useCase = new DiscoverHomeAssistant(connection, logger.child({ component: "DiscoverHomeAssistant" }));

  const controller = new AbortController();
  const onSignal = (): void => controller.abort(new Error("Interrupted"));
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const { result } = await useCase.execute({ signal: controller.signal });
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  } catch (error) {
    logger.fatal("Home Assistant discovery failed", error);
    process.exitCode = 1;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

// Configuration errors surface here, before a logger exists
main().catch((error: unknown) => {
  console.error("Unhandled error:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
