import OpenAI from 'openai';
import type { GenerateContentResponse, GoogleGenAI } from '@google/genai';
import type { ChatClient, ClientFactory, ClientOptions, Provider, ProviderResponse } from './types.js';
import { toProviderResponse } from './response-normalizer.js';
import { errorMessage } from './errors.js';

type GenAIModule = typeof import('@google/genai');

let genAIModule: Promise<GenAIModule> | undefined;

// Gemini is optional: its SDK is only loaded when a gemini model is used
function loadGenAI(): Promise<GenAIModule> {
  genAIModule ??= import('@google/genai');
  return genAIModule;
}

/**
 * Whether the client library for a provider can be loaded.
 */
export async function isProviderLibraryAvailable(provider: Provider): Promise<boolean> {
  if (provider === 'openai') return true;
  try {
    await loadGenAI();
    return true;
  } catch {
    return false;
  }
}

function wrapError(model: string, error: unknown): Error {
  return new Error(`LLM call failed (${model}): ${errorMessage(error)}`, { cause: error });
}

export function createOpenAIClient(options: ClientOptions): ChatClient {
  const { model, temperature, apiKey, timeoutMs } = options;
  // No SDK retries: the fallback chain decides what runs next
  const client = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });

  return {
    provider: 'openai',
    model,
    async generate(messages, signal) {
      try {
        const response = await client.chat.completions.create(
          {
            model,
            messages: messages.map((m) => ({ role: m.role, content: m.content })),
            temperature,
          },
          { signal }
        );
        return toProviderResponse(response.choices[0]?.message);
      } catch (error) {
        throw wrapError(model, error);
      }
    },
  };
}

/**
 * Map a Gemini response: the consolidated `text` when present, otherwise the
 * first candidate's parts with thoughts marked so they are not joined in.
 */
export function fromGeminiResponse(response: GenerateContentResponse): ProviderResponse {
  const text = response.text;
  if (typeof text === 'string') return { kind: 'text', text };

  const parts = response.candidates?.[0]?.content?.parts ?? [];
  return {
    kind: 'fragments',
    fragments: parts.map((part) => ({
      type: part.thought ? 'thought' : 'text',
      text: part.text,
    })),
  };
}

export function createGeminiClient(options: ClientOptions): ChatClient {
  const { model, temperature, apiKey, timeoutMs } = options;
  let client: Promise<GoogleGenAI> | undefined;

  const getClient = (): Promise<GoogleGenAI> => {
    client ??= loadGenAI().then(
      ({ GoogleGenAI }) => new GoogleGenAI({ apiKey, httpOptions: { timeout: timeoutMs } })
    );
    return client;
  };

  return {
    provider: 'gemini',
    model,
    async generate(messages, signal) {
      try {
        const ai = await getClient();
        const systemInstruction = messages
          .filter((m) => m.role === 'system')
          .map((m) => m.content)
          .join('\n');

        const response = await ai.models.generateContent({
          model,
          contents: messages
            .filter((m) => m.role !== 'system')
            .map((m) => ({
              role: m.role === 'assistant' ? 'model' : 'user',
              parts: [{ text: m.content }],
            })),
          config: {
            temperature,
            systemInstruction: systemInstruction || undefined,
            abortSignal: signal,
          },
        });
        return fromGeminiResponse(response);
      } catch (error) {
        throw wrapError(model, error);
      }
    },
  };
}

/**
 * Default client factory: one SDK-backed client per provider.
 */
export const createChatClient: ClientFactory = (options) => {
  switch (options.provider) {
    case 'openai':
      return createOpenAIClient(options);
    case 'gemini':
      return createGeminiClient(options);
  }
};
