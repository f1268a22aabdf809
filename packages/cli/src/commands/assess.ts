import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { assess, logger } from "@pwgauge/engine";
import { CliError, type OutputFormat } from "../args.js";
import { formatResult } from "../formatter.js";
import { readPassword } from "../prompt.js";
import { resolveCliConfig, type ConfigSourceOptions } from "./config.js";

export interface AssessOptions extends ConfigSourceOptions {
  /** Given on the command line; visible in shell history. */
  password?: string;
  /** Read the first line of this file. */
  file?: string;
  format: OutputFormat;
  noColor: boolean;
}

function readPasswordFile(path: string): string {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw new CliError(`could not read password file ${path}: ${(err as Error).message}`);
  }
  return content.split(/\r?\n/)[0] ?? "";
}

/** Null when the user entered nothing. */
async function acquirePassword(options: AssessOptions): Promise<string | null> {
  if (options.password !== undefined) {
    logger.warn("Warning: a password given with --password can end up in your shell history.");
    return options.password;
  }

  const entered = options.file !== undefined
    ? readPasswordFile(resolve(options.cwd, options.file))
    : await readPassword("Enter password to assess (input hidden): ");

  return entered === "" ? null : entered;
}

export async function runAssess(options: AssessOptions): Promise<void> {
  // Resolve first so a bad config fails before the user types anything.
  const config = resolveCliConfig(options);

  const password = await acquirePassword(options);
  if (password === null) {
    logger.info("No password entered.");
    return;
  }

  const assessment = assess(password, config);
  logger.debug(`Assessed ${[...password].length} characters: ${assessment.findings.length} finding(s)`);

  process.stdout.write(formatResult(assessment, { format: options.format, noColor: options.noColor }) + "\n");
}
