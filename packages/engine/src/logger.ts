/**
 * Minimal structured logger for @cvsskit/engine.
 *
 * Respects CVSSKIT_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for CLI/CI output. The level is read
 * on every call so `--verbose` / `--quiet` apply after startup.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
type Level = keyof typeof LEVELS;

function isLevel(raw: string): raw is Level {
  return Object.hasOwn(LEVELS, raw);
}

export function parseLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  const key = raw.toLowerCase();
  return isLevel(key) ? LEVELS[key] : LEVELS.info;
}

function write(threshold: number, msg: string): void {
  if (parseLevel(process.env.CVSSKIT_LOG_LEVEL) <= threshold) {
    process.stderr.write(`[cvsskit] ${msg}\n`);
  }
}

export const logger = {
  debug(msg: string) { write(LEVELS.debug, msg); },
  info(msg: string)  { write(LEVELS.info, msg); },
  warn(msg: string)  { write(LEVELS.warn, msg); },
  error(msg: string) { write(LEVELS.error, msg); },
};
