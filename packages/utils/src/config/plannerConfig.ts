/**
 * ULD Load Planner - Runtime Configuration
 *
 * Read from environment variables, validated once at startup and passed down
 * explicitly; nothing below the CLI and server entry points reads the
 * environment.
 */

import { z } from 'zod';
import { ArmRange, DeckName, PlacementStrategy, DEFAULT_ARM_RANGES } from '../types';

export interface PlannerConfig {
  aircraftDbPath: string;
  uldDbPath: string;
  outputPath: string;
  strategy: PlacementStrategy;
  armRanges: Record<DeckName, ArmRange>;
  port: number;
}

const STRATEGY_TOKENS: Record<string, PlacementStrategy> = {
  'first-fit': 'FIRST_FIT',
  'cg-balance': 'CG_BALANCE'
};

export const strategyTokenSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine(token => token in STRATEGY_TOKENS, {
    message: `Strategy must be one of: ${Object.keys(STRATEGY_TOKENS).join(', ')}`
  })
  .transform(token => STRATEGY_TOKENS[token]);

const armRangeSchema = z
  .string()
  .transform((value, ctx): ArmRange => {
    const parts = value.split(',').map(part => Number(part.trim()));
    if (parts.length !== 2 || parts.some(part => !Number.isFinite(part))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected "foreArm,aftArm"' });
      return z.NEVER;
    }
    return { fore_arm: parts[0], aft_arm: parts[1] };
  });

const envSchema = z.object({
  LOADPLAN_AIRCRAFT_DB: z.string().min(1).default('data/aircraft_db.json'),
  LOADPLAN_ULD_DB: z.string().min(1).default('data/uld_db.json'),
  LOADPLAN_OUTPUT: z.string().min(1).default('loadplan.txt'),
  LOADPLAN_STRATEGY: strategyTokenSchema.default('first-fit'),
  LOADPLAN_MAIN_ARMS: armRangeSchema.optional(),
  LOADPLAN_LOWER_ARMS: armRangeSchema.optional(),
  PORT: z.coerce.number().int().positive().default(3000)
});

export function loadPlannerConfig(
  env: Record<string, string | undefined> = process.env
): PlannerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid planner configuration - ${details}`);
  }

  const data = parsed.data;
  return {
    aircraftDbPath: data.LOADPLAN_AIRCRAFT_DB,
    uldDbPath: data.LOADPLAN_ULD_DB,
    outputPath: data.LOADPLAN_OUTPUT,
    strategy: data.LOADPLAN_STRATEGY,
    armRanges: {
      main: data.LOADPLAN_MAIN_ARMS ?? DEFAULT_ARM_RANGES.main,
      lower: data.LOADPLAN_LOWER_ARMS ?? DEFAULT_ARM_RANGES.lower
    },
    port: data.PORT
  };
}

export function parseStrategyToken(raw: string): PlacementStrategy | null {
  const parsed = strategyTokenSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
