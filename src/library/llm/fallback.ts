import type {
  Candidate,
  ChatClient,
  ClientFactory,
  Message,
  ModelConfig,
  Provider,
} from './types.js';
import type { ModelTracker } from './model-tracker.js';
import { invokeWithTimeout } from './bounded-invoker.js';
import { normalizeResponse } from './response-normalizer.js';
import { classifyFailure, errorMessage } from './errors.js';
import { createChatClient } from './providers.js';
import { DEFAULT_RETRY_ON_PROVIDER_ERROR } from '../constants.js';
import {
  logAttemptFailed,
  logExhausted,
  logFallback,
  logFallbackStopped,
} from './llm-logging.js';

/**
 * Shared state and collaborators for text generation within one report run.
 */
export interface InvocationContext {
  tracker: ModelTracker;
  /** Builds clients for fallback candidates. Default: SDK-backed clients */
  createClient?: ClientFactory;
  /** Whether a generic (non-quota, non-timeout) error moves on to the next candidate */
  retryOnProviderError?: Partial<Record<Provider, boolean>>;
}

type AttemptOutcome = { ok: true; text: string } | { ok: false; proceed: boolean };

function buildMessages(prompt: string): Message[] {
  return [{ role: 'user', content: prompt }];
}

/**
 * One bounded attempt against one candidate. Only successes are tracked.
 * Client construction happens inside so its failures are classified too.
 */
async function attempt(
  candidate: Pick<Candidate, 'model' | 'provider'>,
  getClient: () => ChatClient,
  messages: Message[],
  config: ModelConfig,
  context: InvocationContext
): Promise<AttemptOutcome> {
  try {
    const response = await invokeWithTimeout(getClient(), messages, config.timeoutMs);
    const text = normalizeResponse(response);
    context.tracker.trackCall(candidate.model, true);
    return { ok: true, text };
  } catch (error) {
    const kind = classifyFailure(error);
    logAttemptFailed(candidate.model, kind, errorMessage(error));

    const retryOnError = { ...DEFAULT_RETRY_ON_PROVIDER_ERROR, ...context.retryOnProviderError };
    const proceed = kind !== 'other' || retryOnError[candidate.provider];
    if (!proceed) logFallbackStopped(candidate.model);
    return { ok: false, proceed };
  }
}

/**
 * Try the candidates after `startIndex - 1` in order, returning the first
 * normalized response, or `undefined` once the list is exhausted.
 */
export async function invokeWithFallback(
  config: ModelConfig,
  prompt: string,
  context: InvocationContext,
  startIndex = config.candidates.findIndex((c) => c.model === config.model) + 1
): Promise<string | undefined> {
  const createClient = context.createClient ?? createChatClient;
  const messages = buildMessages(prompt);

  for (let i = startIndex; i < config.candidates.length; i++) {
    const candidate = config.candidates[i];
    logFallback(candidate);

    const outcome = await attempt(
      candidate,
      () =>
        createClient({
          ...candidate,
          temperature: config.temperature,
          timeoutMs: config.timeoutMs,
        }),
      messages,
      config,
      context
    );
    if (outcome.ok) return outcome.text;
    if (!outcome.proceed) return undefined;
  }

  logExhausted(config.candidates.length);
  return undefined;
}

/**
 * Generate text for a prompt: the resolved client first, then the remaining
 * candidates. Never throws; `undefined` means every usable model failed.
 */
export async function invokeLLMWithFallback(
  config: ModelConfig,
  prompt: string,
  context: InvocationContext
): Promise<string | undefined> {
  const outcome = await attempt(config, () => config.client, buildMessages(prompt), config, context);
  if (outcome.ok) return outcome.text;
  if (!outcome.proceed) return undefined;

  return invokeWithFallback(config, prompt, context);
}
