import type { Candidate, ModelConfig } from './types.js';
import type { FailureKind } from './errors.js';
import { theme } from '../ui.js';

const FAILURE_LABELS: Record<FailureKind, string> = {
  rate_limit: 'quota exhausted',
  timeout: 'timed out',
  other: 'error',
};

export function logModelSelected(config: ModelConfig): void {
  const fallbacks = config.candidates
    .filter((c) => c.model !== config.model)
    .map((c) => c.model);
  console.log(
    `  ${theme.bullet} Model ${theme.bold(config.model)}` +
      (fallbacks.length > 0 ? theme.dim(` (fallbacks: ${fallbacks.join(', ')})`) : '')
  );
}

export function logNotConfigured(): void {
  console.log(`  ${theme.warn} ${theme.warning('No LLM API key configured (OPENAI_API_KEY / GEMINI_API_KEY)')}`);
}

export function logAttemptFailed(model: string, kind: FailureKind, message: string): void {
  console.log(
    `  ${theme.cross} ${model}${theme.separator}${theme.error(FAILURE_LABELS[kind])}` +
      theme.dim(` ${message.slice(0, 100)}`)
  );
}

export function logFallback(candidate: Candidate): void {
  console.log(`  ${theme.arrow} Falling back to ${theme.bold(candidate.model)} ${theme.dim(`(${candidate.provider})`)}`);
}

export function logFallbackStopped(model: string): void {
  console.log(`  ${theme.warn} ${theme.warning(`No fallback after generic ${model} error`)}`);
}

export function logExhausted(attempted: number): void {
  console.log(`  ${theme.cross} ${theme.error(`All ${attempted} model(s) failed`)}`);
}
