import type { CompletionProvider } from './types.js';
import type { RightsizerConfig } from '../core/types.js';
import { AnthropicCompletionProvider } from './anthropic.js';
import { OpenAICompletionProvider } from './openai.js';
import { ConfigError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

/**
 * Build the configured completion provider. Returns undefined when it has no API key,
 * which disables AI recommendations for the run.
 */
export function createCompletionProvider(config: RightsizerConfig['ai']): CompletionProvider | undefined {
  const logger = getLogger();
  let provider: CompletionProvider;

  switch (config.provider) {
    case 'anthropic':
      provider = new AnthropicCompletionProvider({ apiKey: config.anthropicApiKey, defaultModel: config.model });
      break;
    case 'openai':
      provider = new OpenAICompletionProvider({ apiKey: config.openaiApiKey, defaultModel: config.model });
      break;
    default:
      throw new ConfigError(`Unknown AI provider: ${String(config.provider)}`);
  }

  if (!provider.isAvailable()) {
    logger.warn({ provider: provider.name }, 'AI provider has no API key, AI analysis disabled');
    return undefined;
  }

  logger.debug({ provider: provider.name }, 'AI provider ready');
  return provider;
}
