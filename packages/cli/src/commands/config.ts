import { resolve } from "node:path";
import {
  CONFIG_FILE_NAME,
  DEFAULT_SCORING_CONFIG,
  loadConfig,
  loadConfigFile,
  logger,
  resolveScoringConfig,
  type ScoringConfig,
} from "@pwgauge/engine";

export interface ConfigSourceOptions {
  /** Explicit config file; otherwise `.pwgauge.yml` in `cwd` if present. */
  configPath?: string;
  cwd: string;
  /** Flag overrides, applied last. */
  overrides: Record<string, unknown>;
}

/**
 * Defaults, then the config file, then command-line flags.
 */
export function resolveCliConfig(options: ConfigSourceOptions): ScoringConfig {
  const filePath = options.configPath
    ? resolve(options.cwd, options.configPath)
    : resolve(options.cwd, CONFIG_FILE_NAME);
  const fileOverrides = options.configPath
    ? loadConfigFile(filePath)
    : loadConfig(options.cwd);

  const base = fileOverrides
    ? resolveScoringConfig(fileOverrides, DEFAULT_SCORING_CONFIG, filePath)
    : DEFAULT_SCORING_CONFIG;

  if (!fileOverrides) logger.debug("No config file, using defaults");

  return resolveScoringConfig(options.overrides, base, "command-line flags");
}
