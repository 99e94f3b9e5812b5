import { availableParallelism } from 'node:os';
import { z } from 'zod';
import { ArgumentError } from './errors.js';

const DEFAULT_CONCURRENCY = Math.min(16, Math.max(1, Math.floor(availableParallelism() / 2)));

export const rasterConfigSchema = z.object({
  /** Largest width a decoder or resize will accept */
  maxWidth: z.number().int().positive().default(16384),
  maxHeight: z.number().int().positive().default(16384),
  /** Row lanes used by the processing driver */
  concurrency: z.number().int().min(1).max(16).default(DEFAULT_CONCURRENCY),
  jpegQuality: z.number().int().min(1).max(100).default(85)
});

export type RasterConfig = z.infer<typeof rasterConfigSchema>;
export type RasterConfigInput = z.input<typeof rasterConfigSchema>;

const ENV_KEYS: readonly [keyof RasterConfig, string][] = [
  ['maxWidth', 'RASTERKIT_MAX_WIDTH'],
  ['maxHeight', 'RASTERKIT_MAX_HEIGHT'],
  ['concurrency', 'RASTERKIT_CONCURRENCY'],
  ['jpegQuality', 'RASTERKIT_JPEG_QUALITY']
];

function readEnvironment(env: NodeJS.ProcessEnv): RasterConfigInput {
  const values: RasterConfigInput = {};
  for (const [key, name] of ENV_KEYS) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== '') {
      values[key] = Number(raw);
    }
  }
  return values;
}

/**
 * Merge environment variables with explicit overrides (overrides win) and validate
 */
export function resolveConfig(
  overrides: RasterConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): RasterConfig {
  const parsed = rasterConfigSchema.safeParse({ ...readEnvironment(env), ...overrides });
  if (!parsed.success) {
    throw new ArgumentError('Invalid configuration', {
      metadata: { issues: parsed.error.issues }
    });
  }
  return parsed.data;
}

let defaultConfig: RasterConfig | null = null;

export function getDefaultConfig(): RasterConfig {
  if (!defaultConfig) {
    defaultConfig = resolveConfig();
  }
  return defaultConfig;
}

export function setDefaultConfig(overrides: RasterConfigInput): RasterConfig {
  defaultConfig = resolveConfig(overrides);
  return defaultConfig;
}

export function resetDefaultConfig(): void {
  defaultConfig = null;
}
