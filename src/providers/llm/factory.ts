import { createLogger } from '../../logger.js';
import { getConfig } from '../../config.js';
import { AuthenticationError } from '../../errors.js';
import type { LLMProviderType, ModelClient, ModelClientFactoryConfig } from './interface.js';
import { createOpenAIModelClient, createGrokModelClient } from './openai.js';
import { createAnthropicModelClient } from './anthropic.js';

const logger = createLogger('model-client-factory');

const SUPPORTED_PROVIDERS: LLMProviderType[] = ['openai', 'anthropic', 'grok'];

function configuredApiKey(provider: LLMProviderType): string | undefined {
  const { providers } = getConfig();
  switch (provider) {
    case 'openai':
      return providers.openaiApiKey;
    case 'anthropic':
      return providers.anthropicApiKey;
    case 'grok':
      return providers.grokApiKey;
  }
}

/**
 * Create a model client for the specified provider.
 * Without an explicit `apiKey` the provider's key from the environment is used.
 * @throws AuthenticationError if no API key is available
 */
export function createModelClient(config: ModelClientFactoryConfig): ModelClient {
  const { provider, ...clientConfig } = config;
  const apiKey = clientConfig.apiKey ?? configuredApiKey(provider);

  if (!apiKey) {
    throw new AuthenticationError(`No API key configured for provider: ${provider}`);
  }

  logger.info({ provider }, 'Creating model client');

  switch (provider) {
    case 'openai':
      return createOpenAIModelClient({ ...clientConfig, apiKey });

    case 'anthropic':
      return createAnthropicModelClient({ ...clientConfig, apiKey });

    case 'grok':
      return createGrokModelClient({ ...clientConfig, apiKey });

    default: {
      const exhaustiveCheck: never = provider;
      throw new Error(`Unknown LLM provider type: ${exhaustiveCheck}`);
    }
  }
}

/**
 * Get the configured default provider type
 */
export function getDefaultProviderType(): LLMProviderType {
  return getConfig().defaultLlmProvider;
}

/**
 * Check if a provider type is supported
 */
export function isProviderSupported(provider: string): provider is LLMProviderType {
  return SUPPORTED_PROVIDERS.some((supported) => supported === provider);
}

/**
 * Get all supported provider types
 */
export function getSupportedProviders(): LLMProviderType[] {
  return [...SUPPORTED_PROVIDERS];
}

/**
 * Get default model for a provider type
 */
export function getDefaultModel(provider: LLMProviderType): string {
  switch (provider) {
    case 'openai':
      return 'gpt-4o';
    case 'anthropic':
      return 'claude-3-5-sonnet-20241022';
    case 'grok':
      return 'grok-2';
  }
}
