import type { ChatClient, Message, ProviderResponse } from './types.js';
import { LLMTimeoutError } from './errors.js';
import { DEFAULT_LLM_TIMEOUT_MS } from '../constants.js';

/**
 * Invoke a client with a hard wall-clock deadline.
 *
 * On timeout the request's AbortSignal fires, so SDKs that honour it cancel
 * the HTTP call; the caller is unblocked either way.
 */
export async function invokeWithTimeout(
  client: ChatClient,
  messages: Message[],
  timeoutMs: number = DEFAULT_LLM_TIMEOUT_MS
): Promise<ProviderResponse> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new LLMTimeoutError(client.model, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([client.generate(messages, controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}
