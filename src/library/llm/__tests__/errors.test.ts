import { describe, it, expect } from 'vitest';
import { classifyFailure, LLMTimeoutError } from '../errors.js';

function statusError(status: number, message = 'request failed'): Error {
  return Object.assign(new Error(message), { status });
}

describe('classifyFailure', () => {
  it('classifies HTTP 429 as a rate limit', () => {
    expect(classifyFailure(statusError(429))).toBe('rate_limit');
  });

  it('classifies quota error codes as a rate limit', () => {
    const error = Object.assign(new Error('billing'), { code: 'insufficient_quota' });
    expect(classifyFailure(error)).toBe('rate_limit');
  });

  it('classifies quota messages as a rate limit', () => {
    expect(classifyFailure(new Error('You exceeded your current quota'))).toBe('rate_limit');
    expect(classifyFailure(new Error('RESOURCE_EXHAUSTED: try later'))).toBe('rate_limit');
  });

  it('classifies bounded-invoker timeouts', () => {
    expect(classifyFailure(new LLMTimeoutError('gpt-5.2', 100))).toBe('timeout');
  });

  it('classifies SDK timeout errors by name', () => {
    const error = new Error('Request aborted');
    error.name = 'APIConnectionTimeoutError';
    expect(classifyFailure(error)).toBe('timeout');
  });

  it('looks through wrapped causes', () => {
    const wrapped = new Error('LLM call failed (gpt-5.2): boom', { cause: statusError(429) });
    expect(classifyFailure(wrapped)).toBe('rate_limit');

    const timedOut = new Error('LLM call failed (gpt-5.2)', {
      cause: new LLMTimeoutError('gpt-5.2', 50),
    });
    expect(classifyFailure(timedOut)).toBe('timeout');
  });

  it('classifies deadline messages as timeouts', () => {
    expect(classifyFailure(new Error('4 DEADLINE_EXCEEDED: Deadline exceeded'))).toBe('timeout');
  });

  it('does not treat a mention of a timeout setting as a timeout', () => {
    expect(classifyFailure(new Error('400 invalid timeout parameter'))).toBe('other');
  });

  it('classifies everything else as other', () => {
    expect(classifyFailure(statusError(500, 'internal error'))).toBe('other');
    expect(classifyFailure('plain string')).toBe('other');
    expect(classifyFailure(undefined)).toBe('other');
  });

  it('formats the timeout message', () => {
    const error = new LLMTimeoutError('gemini-3-pro-preview', 2500);
    expect(error.message).toBe('LLM call timed out after 2500ms (gemini-3-pro-preview)');
    expect(error.name).toBe('LLMTimeoutError');
  });
});
