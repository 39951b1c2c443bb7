import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  createModelClient,
  getDefaultModel,
  getDefaultProviderType,
  getSupportedProviders,
  isProviderSupported,
} from './factory.js';
import { OpenAIModelClient } from './openai.js';
import { AnthropicModelClient } from './anthropic.js';
import { resetConfig } from '../../config.js';

describe('model client factory', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('creates a client per provider', () => {
    expect(createModelClient({ provider: 'openai', apiKey: 'test-secret' })).toBeInstanceOf(OpenAIModelClient);
    expect(createModelClient({ provider: 'anthropic', apiKey: 'test-secret' })).toBeInstanceOf(AnthropicModelClient);

    const grok = createModelClient({ provider: 'grok', apiKey: 'test-secret' });
    expect(grok).toBeInstanceOf(OpenAIModelClient);
    expect(grok.name).toBe('grok');
  });

  it('falls back to the key from the environment', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    resetConfig();

    expect(createModelClient({ provider: 'anthropic' }).name).toBe('anthropic');
  });

  it('fails without any key', () => {
    resetConfig();
    expect(() => createModelClient({ provider: 'openai' })).toThrow('No API key configured for provider: openai');
  });

  it('reads the default provider from the environment', () => {
    resetConfig();
    expect(getDefaultProviderType()).toBe('anthropic');

    vi.stubEnv('DEFAULT_LLM_PROVIDER', 'grok');
    resetConfig();
    expect(getDefaultProviderType()).toBe('grok');
  });

  it('lists supported providers and their default models', () => {
    expect(getSupportedProviders()).toEqual(['openai', 'anthropic', 'grok']);
    expect(isProviderSupported('openai')).toBe(true);
    expect(isProviderSupported('gemini')).toBe(false);
    expect(getDefaultModel('openai')).toBe('gpt-4o');
    expect(getDefaultModel('anthropic')).toBe('claude-3-5-sonnet-20241022');
    expect(getDefaultModel('grok')).toBe('grok-2');
  });
});
