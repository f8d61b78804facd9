// Pipeline settings: defaults < environment < explicit overrides, validated with zod.
// Invalid settings are a programmer error and throw before any work starts.

import { z } from 'zod';
import { LANGUAGES } from '../types/agents.js';
import { ConfigError } from '../utils/errors.js';

export const DEFAULT_MODEL = 'claude-haiku-4-5-20251001';

/** Largest delay setTimeout honors; longer ones fire immediately */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const PipelineSettingsSchema = z.object({
  model: z.string().trim().min(1).default(DEFAULT_MODEL),
  temperature: z.coerce.number().min(0).max(1).default(0.2),
  maxTokens: z.coerce.number().int().positive().default(2048),
  debateRounds: z.coerce.number().int().min(1).max(3).default(1),
  taskTimeoutMs: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).default(60_000),
  dataTimeoutMs: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).default(30_000),
  language: z.preprocess((v) => (typeof v === 'string' ? v.trim().toLowerCase() : v), z.enum(LANGUAGES)).default('en'),
  maxConcurrent: z.coerce.number().int().min(1).max(10).default(3),
});

export type PipelineSettings = z.infer<typeof PipelineSettingsSchema>;
export type PipelineSettingsInput = Partial<PipelineSettings>;

const ENV_KEYS: Record<keyof PipelineSettings, string> = {
  model: 'SIGNAL_DESK_MODEL',
  temperature: 'SIGNAL_DESK_TEMPERATURE',
  maxTokens: 'SIGNAL_DESK_MAX_TOKENS',
  debateRounds: 'SIGNAL_DESK_DEBATE_ROUNDS',
  taskTimeoutMs: 'SIGNAL_DESK_TASK_TIMEOUT_MS',
  dataTimeoutMs: 'SIGNAL_DESK_DATA_TIMEOUT_MS',
  language: 'SIGNAL_DESK_LANGUAGE',
  maxConcurrent: 'SIGNAL_DESK_MAX_CONCURRENT',
};

export function parseSettings(input: unknown): PipelineSettings {
  const parsed = PipelineSettingsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid settings: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function loadSettings(
  overrides: PipelineSettingsInput = {},
  env: NodeJS.ProcessEnv = process.env,
): PipelineSettings {
  const fromEnv: Record<string, unknown> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName]?.trim();
    if (value) fromEnv[key] = value;
  }
  const explicit = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  return parseSettings({ ...fromEnv, ...explicit });
}
