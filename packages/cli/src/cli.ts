#!/usr/bin/env node

import { ConfigError } from "@pwgauge/engine";
import { CliError, colorDisabled, overridesFromArgs, parseArgs, resolveFormat } from "./args.js";
import { runAssess } from "./commands/assess.js";
import { runPatterns } from "./commands/patterns.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36mpwgauge\x1b[0m: local password strength assessor
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  pwgauge [assess] [options]        Assess a password (prompts, input hidden)
  pwgauge patterns [options]        List the active common-pattern list
  pwgauge version                   Print version

\x1b[1mINPUT\x1b[0m
  -p, --password <pw>               Password on the command line (NOT RECOMMENDED)
  --file <path>                     Read the password from the first line of a file
                                    (piped stdin is read the same way)

\x1b[1mOUTPUT\x1b[0m
  --format <fmt>                    table, json, markdown (default: table)
  --json                            Same as --format json
  --no-color                        Disable colours (or set NO_COLOR)

\x1b[1mSCORING\x1b[0m
  --config <path>                   Config file (default: ./.pwgauge.yml if present)
  --min-length <n>                  Minimum length (default: 8)
  --ideal-length <n>                Length for full length marks (default: 12)
  --patterns <list>                 Comma-separated weak patterns, replacing the defaults
  --extra-patterns <list>           Comma-separated weak patterns, added to the list
  --thresholds <a,b,c,d,e>          Lower bounds of the five rating bands (default: 0,30,50,70,88)

\x1b[1mEXAMPLES\x1b[0m
  pwgauge                                      Prompt and print a report
  pwgauge --json                               Prompt and print JSON
  pwgauge --file secret.txt --format markdown  Markdown report for a stored password
  pwgauge --extra-patterns acme,summer2024     Flag company-specific words
  pwgauge patterns                             Show the active pattern list

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                         Set log level to debug
  --quiet                           Suppress info/warn output
  -h, --help                        Show this help
  -v, --version                     Print version

\x1b[1mENVIRONMENT\x1b[0m
  PWGAUGE_LOG_LEVEL                 Log level: debug, info, warn, error, silent
  NO_COLOR                          Disable colours

`);
}

async function main(): Promise<void> {
  const { command, args, positional } = parseArgs(process.argv.slice(2));

  if (command === "help" || args["help"] === "true") {
    printHelp();
    return;
  }

  if (command === "version" || args["version"] === "true") {
    process.stdout.write(`pwgauge v${VERSION}\n`);
    return;
  }

  const common = {
    configPath: args["config"],
    cwd: process.cwd(),
    overrides: overridesFromArgs(args),
    format: resolveFormat(args),
    noColor: colorDisabled(args),
  };

  switch (command) {
    case "patterns":
      runPatterns(common);
      break;

    case "assess":
    default:
      if (positional.length > 0) {
        throw new CliError(`Unknown command: ${positional[0]} (see pwgauge --help)`);
      }
      await runAssess({ ...common, password: args["password"], file: args["file"] });
      break;
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    process.stderr.write(`[pwgauge] Configuration error: ${err.message}\n`);
    process.exit(1);
  }
  if (err instanceof CliError) {
    process.stderr.write(`[pwgauge] Error: ${err.message}\n`);
    process.exit(err.exitCode);
  }
  process.stderr.write(`[pwgauge] Fatal: ${String(err)}\n`);
  process.exit(1);
});
