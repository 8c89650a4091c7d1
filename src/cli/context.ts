import { resolveConfigPath } from "../config/bootstrap.js";
import { HierarchicalConfig } from "../config/store.js";
import { createLogger, type AppLogger } from "../shared/logger.js";
import type { LogLevel } from "../shared/types.js";

export interface AppContext {
  configPath: string | null;
  config: HierarchicalConfig;
  logger: AppLogger;
}

export function createAppContext(input: { configPathOverride?: string; logLevel: LogLevel }): AppContext {
  const logger = createLogger(input.logLevel);
  const configPath = resolveConfigPath(input.configPathOverride);
  const config = new HierarchicalConfig({ logger });

  if (configPath) {
    config.loadFromFile(configPath);
  }

  logger.debug({ configPath }, "context created");

  return {
    configPath,
    config,
    logger
  };
}
