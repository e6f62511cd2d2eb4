/**
 * Supported provider families.
 */
export type Provider = 'openai' | 'gemini';

/**
 * Chat message for LLM calls.
 */
export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * One chunk of a structured model response.
 */
export type ResponseFragment = string | { type?: string; text?: string };

/**
 * Provider output, classified at the adapter boundary.
 */
export type ProviderResponse =
  | { kind: 'text'; text: string }
  | { kind: 'fragments'; fragments: ResponseFragment[] }
  | { kind: 'unknown'; value: unknown };

/**
 * A bound model handle. `generate` must honour `signal` so a timed-out
 * request is cancelled rather than left running.
 */
export interface ChatClient {
  readonly provider: Provider;
  readonly model: string;
  generate(messages: Message[], signal?: AbortSignal): Promise<ProviderResponse>;
}

export interface ClientOptions {
  provider: Provider;
  model: string;
  temperature: number;
  apiKey: string;
  timeoutMs: number;
}

export type ClientFactory = (options: ClientOptions) => ChatClient;

/**
 * One (provider, model, credential) tuple eligible for an attempt.
 */
export interface Candidate {
  readonly provider: Provider;
  readonly model: string;
  readonly apiKey: string;
}

/**
 * Credentials per provider. Blank or missing means unusable.
 */
export type Credentials = Partial<Record<Provider, string>>;

/**
 * Resolved model for one text-generation request. Never mutated.
 */
export interface ModelConfig {
  readonly model: string;
  readonly temperature: number;
  readonly timeoutMs: number;
  readonly apiKey: string;
  readonly provider: Provider;
  readonly client: ChatClient;
  readonly candidates: readonly Candidate[];
}

export interface CallRecord {
  readonly model: string;
  readonly succeeded: boolean;
}
