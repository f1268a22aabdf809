import type { OutputFormat } from "../args.js";
import { formatPatternList } from "../formatter.js";
import { resolveCliConfig, type ConfigSourceOptions } from "./config.js";

export interface PatternsOptions extends ConfigSourceOptions {
  format: OutputFormat;
  noColor: boolean;
}

export function runPatterns(options: PatternsOptions): void {
  const config = resolveCliConfig(options);
  process.stdout.write(
    formatPatternList(config.commonPatterns, { format: options.format, noColor: options.noColor }) + "\n",
  );
}
