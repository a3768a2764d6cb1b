import type { CompletionProvider, CompletionRequest, ProviderConfig } from './types.js';
import { getLogger } from '../core/logger.js';
import { ProviderError, toError } from '../core/errors.js';
import { withTimeout } from '../utils/retry.js';

/**
 * Shared request logging, timeout and error wrapping for completion providers.
 * Retries are left to the caller so one policy covers every provider.
 */
export abstract class BaseCompletionProvider implements CompletionProvider {
  abstract readonly name: string;
  abstract readonly defaultModel: string;

  protected logger = getLogger();
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = {
      timeout: 120000,
      ...config,
    };
  }

  async complete(request: CompletionRequest): Promise<string> {
    const model = request.model || this.config.defaultModel || this.defaultModel;
    this.logger.debug({ provider: this.name, model, maxTokens: request.maxTokens }, 'Completion request');

    const timeout = this.config.timeout ?? 120000;
    try {
      return await withTimeout(
        this._complete({ ...request, model }),
        timeout,
        `${this.name} request timed out after ${timeout}ms`,
      );
    } catch (err) {
      const error = toError(err);
      throw new ProviderError(`${this.name} completion failed: ${error.message}`, this.name, error);
    }
  }

  abstract isAvailable(): boolean;

  protected abstract _complete(request: CompletionRequest & { model: string }): Promise<string>;
}
