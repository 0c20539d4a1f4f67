import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3410),
  DATA_DIR: z.string().min(1).default('data'),
  SWEEP_INTERVAL_MS: z.coerce.number().int().min(0).default(60000),
  WARNING_RATIO: z.coerce.number().gt(0).lt(1).default(0.8),
  GRID_CELL_DEGREES: z.coerce.number().positive().default(1),
  MAX_CELLS_PER_ZONE: z.coerce.number().int().positive().default(4096),
  CORS_ORIGIN: z.string().default('*'),
});

export interface ServerConfig {
  port: number;
  dataDir: string;
  sweepIntervalMs: number; // 0 disables the internal sweep scheduler
  warningRatio: number;
  gridCellDegrees: number;
  maxCellsPerZone: number;
  corsOrigin: string;
}

export class ConfigError extends Error {
  constructor(readonly keys: string[], message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(i => String(i.path[0])))];
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(keys, `Invalid configuration (${detail})`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    dataDir: e.DATA_DIR,
    sweepIntervalMs: e.SWEEP_INTERVAL_MS,
    warningRatio: e.WARNING_RATIO,
    gridCellDegrees: e.GRID_CELL_DEGREES,
    maxCellsPerZone: e.MAX_CELLS_PER_ZONE,
    corsOrigin: e.CORS_ORIGIN,
  };
}
