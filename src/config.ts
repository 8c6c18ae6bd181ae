// Load environment variables first
import dotenv from 'dotenv';
dotenv.config();

import * as path from 'path';
import { z } from 'zod';

const EnvSchema = z.object({
  TANK_BOM_DATA_DIR: z.string().optional(),
  DEFAULT_EXCHANGE_RATE: z.coerce.number().positive().default(3.75),
  BOLT_SPARE_FACTOR: z.coerce.number().min(1).default(1),
  TEMPORAL_ADDRESS: z.string().default('localhost:7233'),
  TEMPORAL_TASK_QUEUE: z.string().default('tank-bom-queue'),
  RUNS_DIR: z.string().optional()
});

export interface AppConfig {
  dataDir: string;
  defaultExchangeRate: number;
  boltSpareFactor: number;
  temporalAddress: string;
  taskQueue: string;
  runsDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  const vars = parsed.data;

  return {
    dataDir: vars.TANK_BOM_DATA_DIR || path.join(__dirname, '../data'),
    defaultExchangeRate: vars.DEFAULT_EXCHANGE_RATE,
    boltSpareFactor: vars.BOLT_SPARE_FACTOR,
    temporalAddress: vars.TEMPORAL_ADDRESS,
    taskQueue: vars.TEMPORAL_TASK_QUEUE,
    runsDir: vars.RUNS_DIR || path.join(process.cwd(), 'runs')
  };
}

export const config = loadConfig();
