import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({}, {})).toEqual({
      openaiApiKey: '',
      geminiApiKey: '',
      primaryModel: 'gpt-5.2',
      temperature: 0,
      timeoutMs: 60_000,
      contextDir: 'context',
    });
  });

  it('reads credentials and settings from the environment', () => {
    const config = loadConfig(
      {},
      {
        OPENAI_API_KEY: 'test-openai-key',
        GEMINI_API_KEY: 'test-gemini-key',
        LLM_PRIMARY_MODEL: 'gemini-3-pro-preview',
        LLM_TEMPERATURE: '0.4',
        LLM_TIMEOUT_SECONDS: '15',
        CONTEXT_DIR: 'docs/context',
      }
    );

    expect(config).toEqual({
      openaiApiKey: 'test-openai-key',
      geminiApiKey: 'test-gemini-key',
      primaryModel: 'gemini-3-pro-preview',
      temperature: 0.4,
      timeoutMs: 15_000,
      contextDir: 'docs/context',
    });
  });

  it('ignores invalid numbers', () => {
    const config = loadConfig({}, { LLM_TEMPERATURE: 'warm', LLM_TIMEOUT_SECONDS: '-3' });

    expect(config.temperature).toBe(0);
    expect(config.timeoutMs).toBe(60_000);
  });

  it('applies overrides last', () => {
    const config = loadConfig({ timeoutMs: 250 }, { LLM_TIMEOUT_SECONDS: '15' });

    expect(config.timeoutMs).toBe(250);
  });
});
