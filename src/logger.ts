import { pino, type Logger, type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(value: string | undefined): LevelWithSilent {
  const level = LEVELS.find((candidate) => candidate === value?.toLowerCase());
  return level ?? 'warn';
}

/**
 * Root logger. Quiet by default; set RASTERKIT_LOG_LEVEL=debug to trace codecs and processors.
 */
export const logger: Logger = pino({
  name: 'rasterkit',
  level: resolveLevel(process.env.RASTERKIT_LOG_LEVEL)
});

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
