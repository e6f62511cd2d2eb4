import type { Provider } from './llm/types.js';

// Model preference, in fallback order
export interface ModelSpec {
  model: string;
  provider: Provider;
}

export const DEFAULT_PRIMARY_MODEL = 'gpt-5.2';

export const DEFAULT_MODEL_ORDER: readonly ModelSpec[] = [
  { model: 'gpt-5.2', provider: 'openai' },
  { model: 'gemini-3-pro-preview', provider: 'gemini' },
  { model: 'gemini-3-flash-preview', provider: 'gemini' },
  { model: 'gpt-5-mini', provider: 'openai' },
];

// The provider that needs no library probe
export const DEFAULT_PROVIDER: Provider = 'openai';

// Generic (non-quota, non-timeout) errors only fall through to the next
// candidate for these providers
export const DEFAULT_RETRY_ON_PROVIDER_ERROR: Readonly<Record<Provider, boolean>> = {
  openai: true,
  gemini: false,
};

// Invocation constants
export const DEFAULT_TEMPERATURE = 0;
export const DEFAULT_LLM_TIMEOUT_MS = 60_000;
export const MS_PER_SECOND = 1000;

// Report constants
export const DEFAULT_CONTEXT_DIR = 'context';
export const DEFAULT_TABLE_DIGITS = 3;
export const AI_NOT_CONFIGURED_MESSAGE = 'AI analysis unavailable (API key not configured).';
export const AI_UNAVAILABLE_MESSAGE = 'AI analysis unavailable (all models failed).';
