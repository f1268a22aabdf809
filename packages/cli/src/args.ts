import { logger } from "@pwgauge/engine";

export type OutputFormat = "table" | "json" | "markdown";

export const COMMANDS = new Set(["assess", "patterns", "version", "help"]);

const BOOLEAN_FLAGS = new Set([
  "help", "version", "json", "no-color", "verbose", "quiet",
]);

const KNOWN_FLAGS = new Set([
  ...BOOLEAN_FLAGS,
  "password", "file", "format", "config",
  "min-length", "ideal-length", "patterns", "extra-patterns", "thresholds",
]);

const SHORT_FLAGS: Record<string, string> = { h: "help", v: "version", p: "password" };

/** A failure the CLI reports without a stack trace. */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "CliError";
    this.exitCode = exitCode;
  }
}

export interface ParsedArgs {
  command: string;
  args: Record<string, string>;
  positional: string[];
}

/** True when `token` is a flag this parser knows, so it cannot be a value. */
function isKnownFlag(token: string): boolean {
  if (token.startsWith("--")) {
    const eq = token.indexOf("=");
    return KNOWN_FLAGS.has(eq < 0 ? token.slice(2) : token.slice(2, eq));
  }
  return token.startsWith("-") && Object.hasOwn(SHORT_FLAGS, token.slice(1));
}

/**
 * Split argv into a command, `--flag value` (or `--flag=value`) pairs and
 * positionals. The command defaults to `assess` when the first argument is
 * not one. A value may itself start with dashes unless it is a known flag.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const first = argv[0] ?? "";
  const explicit = COMMANDS.has(first);
  const command = explicit ? first : "assess";
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = explicit ? 1 : 0; i < argv.length; i++) {
    const arg = argv[i];
    let key: string | null = null;
    let inline: string | undefined;

    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      key = eq < 0 ? arg.slice(2) : arg.slice(2, eq);
      if (eq >= 0) inline = arg.slice(eq + 1);
      if (!KNOWN_FLAGS.has(key)) {
        logger.warn(`Warning: unknown flag --${key}`);
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      const short = arg.slice(1);
      if (Object.hasOwn(SHORT_FLAGS, short)) {
        key = SHORT_FLAGS[short];
      } else {
        key = short;
        logger.warn(`Warning: unknown flag -${short}`);
      }
    }

    if (key === null) {
      positional.push(arg);
      continue;
    }

    if (BOOLEAN_FLAGS.has(key)) {
      args[key] = "true";
    } else if (inline !== undefined) {
      args[key] = inline;
    } else {
      if (i + 1 >= argv.length || isKnownFlag(argv[i + 1])) {
        throw new CliError(`--${key} requires a value`);
      }
      args[key] = argv[++i];
    }
  }

  // Handle --verbose / --quiet
  if (args["verbose"] === "true") {
    process.env.PWGAUGE_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.PWGAUGE_LOG_LEVEL = "error";
  }

  return { command, args, positional };
}

export function resolveFormat(args: Record<string, string>): OutputFormat {
  if (args["json"] === "true") return "json";
  const format = args["format"] ?? "table";
  if (format === "table" || format === "json" || format === "markdown") return format;
  throw new CliError(`--format must be one of table, json, markdown (got '${format}')`);
}

function splitList(raw: string): string[] {
  return raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Scoring overrides given on the command line, in the shape
 * resolveScoringConfig validates. Numbers that do not parse become NaN and
 * are rejected there.
 */
export function overridesFromArgs(args: Record<string, string>): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (args["min-length"] !== undefined) overrides.minLength = Number(args["min-length"]);
  if (args["ideal-length"] !== undefined) overrides.idealLength = Number(args["ideal-length"]);
  if (args["patterns"] !== undefined) overrides.commonPatterns = splitList(args["patterns"]);
  if (args["extra-patterns"] !== undefined) overrides.extraPatterns = splitList(args["extra-patterns"]);
  if (args["thresholds"] !== undefined) overrides.scoreThresholds = splitList(args["thresholds"]).map(Number);
  return overrides;
}

export function colorDisabled(args: Record<string, string>, env: NodeJS.ProcessEnv = process.env): boolean {
  return args["no-color"] === "true" || (env.NO_COLOR !== undefined && env.NO_COLOR !== "");
}
