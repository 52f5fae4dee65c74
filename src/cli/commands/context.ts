import path from "node:path";
import type { PollCapability } from "../../capability/types";
import type { PollbotConfig } from "../../config";
import { loadPollCapability } from "../../capability/loader";
import { loadConfigOrDefaults } from "../../config/loader";
import { configureLogger, logger } from "../../logger";
import { formatError } from "../../session/errors";

export interface CliContextOptions {
  config?: string;
  capability?: string;
}

export interface CliContext {
  config: PollbotConfig;
  configPath: string;
  capability: PollCapability;
}

/**
 * Loads the config file and the capability module for a command. Exits with code 1
 * when either cannot be loaded.
 */
export async function loadCliContext(options: CliContextOptions): Promise<CliContext> {
  const result = loadConfigOrDefaults(options.config);
  if (!result.success || !result.config) {
    logger.error({ path: result.path, errors: result.errors }, "Failed to load configuration");
    process.exit(1);
  }
  const config = result.config;
  configureLogger(config.logging?.level);

  const capabilityConfig = options.capability
    ? { module: path.resolve(options.capability), options: config.capability?.options }
    : config.capability;
  if (!capabilityConfig) {
    logger.error(
      { path: result.path },
      "No capability module configured; set capability.module or pass --capability",
    );
    process.exit(1);
  }

  try {
    const capability = await loadPollCapability(capabilityConfig);
    return { config, configPath: result.path, capability };
  } catch (error) {
    logger.error({ error: formatError(error) }, "Capability load failed");
    process.exit(1);
  }
}
