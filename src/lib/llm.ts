import { AnthropicProvider } from './anthropic.js';
import { ConfigError } from './errors.js';
import { GeminiProvider } from './gemini.js';
import { OpenAIProvider } from './openai.js';
import { PROVIDER_NAMES, type AuditProvider, type ProviderSettings } from './provider.js';

export type ProviderFactory = (name: string, settings: ProviderSettings) => AuditProvider;

/** Default model per provider when the configured model belongs to another family. */
export const DEFAULT_MODELS = {
  anthropic: 'claude-sonnet-4-5',
  openai: 'gpt-4.1',
  gemini: 'gemini-2.5-flash',
} as const;

export const createProvider: ProviderFactory = (name, settings) => {
  switch (name) {
    case 'anthropic':
      return new AnthropicProvider(settings);
    case 'openai':
      return new OpenAIProvider(settings);
    case 'gemini':
      return new GeminiProvider(settings);
    default:
      throw new ConfigError(`Unknown provider: ${name}. Available: ${PROVIDER_NAMES.join(', ')}`);
  }
};
