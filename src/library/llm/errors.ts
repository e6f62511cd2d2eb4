/**
 * Raised by the bounded invoker when a model does not answer in time.
 */
export class LLMTimeoutError extends Error {
  readonly model: string;
  readonly timeoutMs: number;

  constructor(model: string, timeoutMs: number) {
    super(`LLM call timed out after ${timeoutMs}ms (${model})`);
    this.name = 'LLMTimeoutError';
    this.model = model;
    this.timeoutMs = timeoutMs;
  }
}

export type FailureKind = 'rate_limit' | 'timeout' | 'other';

const RATE_LIMIT_CODES = new Set(['rate_limit_exceeded', 'insufficient_quota', 'RESOURCE_EXHAUSTED']);
const RATE_LIMIT_PATTERNS = ['rate limit', 'ratelimit', 'quota', 'resource_exhausted', 'too many requests'];
const TIMEOUT_PATTERNS = ['timed out', 'deadline exceeded'];
const TIMEOUT_ERROR_NAMES = new Set(['LLMTimeoutError', 'APIConnectionTimeoutError', 'TimeoutError']);

function readField(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && !chain.includes(current)) {
    chain.push(current);
    current = typeof current === 'object' ? readField(current, 'cause') : undefined;
  }
  return chain;
}

function classifyOne(error: unknown): FailureKind {
  if (error instanceof LLMTimeoutError) return 'timeout';
  if (typeof error !== 'object' || error === null) return 'other';

  const status = readField(error, 'status');
  const code = readField(error, 'code');
  const name = readField(error, 'name');
  const message = error instanceof Error ? error.message.toLowerCase() : '';

  if (status === 429 || (typeof code === 'string' && RATE_LIMIT_CODES.has(code))) {
    return 'rate_limit';
  }
  if (RATE_LIMIT_PATTERNS.some((p) => message.includes(p))) return 'rate_limit';

  if (typeof name === 'string' && TIMEOUT_ERROR_NAMES.has(name)) return 'timeout';
  if (TIMEOUT_PATTERNS.some((p) => message.includes(p))) return 'timeout';

  return 'other';
}

/**
 * Classify a provider failure for fallback purposes.
 * Walks the `cause` chain so wrapped SDK errors keep their status.
 */
export function classifyFailure(error: unknown): FailureKind {
  let result: FailureKind = 'other';
  for (const link of causeChain(error)) {
    const kind = classifyOne(link);
    if (kind === 'rate_limit') return kind;
    if (kind === 'timeout') result = kind;
  }
  return result;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
