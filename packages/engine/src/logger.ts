/**
 * Minimal structured logger for @pwgauge/engine.
 *
 * Respects PWGAUGE_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for CLI/JSON output.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
type Level = keyof typeof LEVELS;

function isLevel(raw: string): raw is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, raw);
}

function parseLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  const key = raw.toLowerCase();
  return isLevel(key) ? LEVELS[key] : LEVELS.info;
}

// Read per call: the CLI flips the level after this module has loaded.
function enabled(at: number): boolean {
  return parseLevel(process.env.PWGAUGE_LOG_LEVEL) <= at;
}

export const logger = {
  debug(msg: string) { if (enabled(LEVELS.debug)) process.stderr.write(`[pwgauge] ${msg}\n`); },
  info(msg: string)  { if (enabled(LEVELS.info))  process.stderr.write(`[pwgauge] ${msg}\n`); },
  warn(msg: string)  { if (enabled(LEVELS.warn))  process.stderr.write(`[pwgauge] ${msg}\n`); },
  error(msg: string) { if (enabled(LEVELS.error)) process.stderr.write(`[pwgauge] ${msg}\n`); },
};
