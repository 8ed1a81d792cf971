import { z } from 'zod';
import { DEFAULT_STEP_DELAY_MS } from '../services/workflow/workflowSteps';

export interface AppConfig {
  apiBaseUrl: string;
  apiPort: number;
  stepDelayMs: number;
  dataDir: string | undefined;
}

const envSchema = z.object({
  KYB_API_BASE_URL: z.string().url().default('http://localhost:8080'),
  KYB_API_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  KYB_STEP_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_STEP_DELAY_MS),
  KYB_DATA_DIR: z.string().min(1).optional(),
});

export type EnvSource = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Empty strings count as unset so `.env` placeholders fall back to defaults. */
export function loadAppConfig(env: EnvSource): AppConfig {
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  return {
    apiBaseUrl: parsed.data.KYB_API_BASE_URL,
    apiPort: parsed.data.KYB_API_PORT,
    stepDelayMs: parsed.data.KYB_STEP_DELAY_MS,
    dataDir: parsed.data.KYB_DATA_DIR,
  };
}
