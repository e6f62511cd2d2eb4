import {
  DEFAULT_CONTEXT_DIR,
  DEFAULT_LLM_TIMEOUT_MS,
  DEFAULT_PRIMARY_MODEL,
  DEFAULT_TEMPERATURE,
  MS_PER_SECOND,
} from './constants.js';

/**
 * Runtime configuration, resolved from the environment.
 */
export interface ReportConfig {
  openaiApiKey: string;
  geminiApiKey: string;
  primaryModel: string;
  temperature: number;
  timeoutMs: number;
  contextDir: string;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Reads configuration from environment variables, then applies overrides.
 * Called per request so credentials are never cached.
 */
export function loadConfig(
  overrides: Partial<ReportConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ReportConfig {
  const timeoutSeconds = parseNumber(env.LLM_TIMEOUT_SECONDS, DEFAULT_LLM_TIMEOUT_MS / MS_PER_SECOND);

  return {
    openaiApiKey: env.OPENAI_API_KEY ?? '',
    geminiApiKey: env.GEMINI_API_KEY ?? '',
    primaryModel: env.LLM_PRIMARY_MODEL?.trim() || DEFAULT_PRIMARY_MODEL,
    temperature: parseNumber(env.LLM_TEMPERATURE, DEFAULT_TEMPERATURE),
    timeoutMs: timeoutSeconds * MS_PER_SECOND,
    contextDir: env.CONTEXT_DIR || DEFAULT_CONTEXT_DIR,
    ...overrides,
  };
}
